import { ZBase32Codec } from "../encoding/ZBase32Codec"

/** Signed decimal integer, at most 19 digits plus an optional minus sign. */
const DECIMAL_REGEX = /^-?\d{1,19}$/

/**
 * Immutable value object wrapping one 64-bit Snowflake id.
 *
 * Responsibilities:
 *   - Holds the id as a signed 64-bit bigint
 *   - Provides the 13-character z-base-32 form via toString() / toJSON()
 *   - Provides the decimal form via toDecimalString() (SQL BIGINT, logs)
 *   - Supports value equality and ordering
 *
 * Ordering follows the signed integer, which is creation order for ids
 * minted before ~2080.
 */
export class SnowflakeValue {
  private readonly id: bigint

  /** Lazily cached encoded string. */
  private cachedString?: string

  /**
   * @param id - Any bigint; normalised to its signed 64-bit value.
   *
   * @throws {TypeError} If id is not a bigint.
   */
  constructor(id: bigint) {
    if (typeof id !== "bigint") {
      throw new TypeError(
        `SnowflakeValue: constructor requires a bigint. Received: ${typeof id}`
      )
    }

    this.id = BigInt.asIntN(64, id)
  }

  /**
   * Returns the 13-character z-base-32 form, e.g. "yrbgh1ofyyyyb".
   * Cached after the first call.
   */
  toString(): string {
    if (this.cachedString === undefined) {
      this.cachedString = ZBase32Codec.encode(this.id)
    }

    return this.cachedString
  }

  toBigInt(): bigint {
    return this.id
  }

  /** Signed decimal representation, as stored in a BIGINT column. */
  toDecimalString(): string {
    return this.id.toString()
  }

  /** JSON carries the encoded string: bigint has no JSON form. */
  toJSON(): string {
    return this.toString()
  }

  /** Value equality against another SnowflakeValue, a bigint, or an encoded string. */
  equals(other: SnowflakeValue | bigint | string): boolean {
    if (other instanceof SnowflakeValue) {
      return this.id === other.id
    }
    if (typeof other === "bigint") {
      return this.id === BigInt.asIntN(64, other)
    }
    return this.toString() === other
  }

  /** Returns -1, 0 or 1. */
  compareTo(other: SnowflakeValue): number {
    if (this.id < other.id) return -1
    if (this.id > other.id) return 1
    return 0
  }

  // ─── Static Factories ───────────────────────────────────────────────────

  /**
   * Constructs a SnowflakeValue from its 13-character encoded form.
   *
   * Surrounding whitespace is trimmed; case is significant.
   *
   * @throws {TypeError} If input is not a string.
   * @throws {Error}     If input does not decode (reason included in the message).
   *
   * @example
   * ```ts
   * const id = SnowflakeValue.fromString(req.params.id)
   * ```
   */
  static fromString(input: string): SnowflakeValue {
    if (typeof input !== "string") {
      throw new TypeError(
        `SnowflakeValue.fromString: expected a string, received ${typeof input}.`
      )
    }

    const trimmed = input.trim()
    const result = ZBase32Codec.decode(trimmed)

    if (!result.ok) {
      throw new Error(
        `SnowflakeValue.fromString: cannot decode "${trimmed}" (${result.reason}). ` +
        `Ids are 13 characters from the z-base-32 alphabet.`
      )
    }

    return new SnowflakeValue(result.id)
  }

  /** @param id - Any bigint; normalised to signed 64 bits. */
  static fromBigInt(id: bigint): SnowflakeValue {
    return new SnowflakeValue(id)
  }

  /**
   * Constructs a SnowflakeValue from a signed decimal string, such as an
   * int8 column returned by node-postgres.
   *
   * @param input - e.g. "4194324480" or "-1"; surrounding whitespace is ignored.
   *
   * @throws {Error}      Not a decimal integer.
   * @throws {RangeError} Outside the signed 64-bit range.
   */
  static fromDecimalString(input: string): SnowflakeValue {
    const trimmed = typeof input === "string" ? input.trim() : ""

    if (!DECIMAL_REGEX.test(trimmed)) {
      throw new Error(
        `SnowflakeValue.fromDecimalString: expected a signed decimal integer. ` +
        `Received: "${String(input)}"`
      )
    }

    const id = BigInt(trimmed)
    if (BigInt.asIntN(64, id) !== id) {
      throw new RangeError(
        `SnowflakeValue.fromDecimalString: ${trimmed} is outside the signed 64-bit range.`
      )
    }

    return new SnowflakeValue(id)
  }

  /**
   * Type guard: returns true if the value is a SnowflakeValue instance.
   */
  static isSnowflakeValue(value: unknown): value is SnowflakeValue {
    return value instanceof SnowflakeValue
  }
}
