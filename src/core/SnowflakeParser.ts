import { SnowflakeMetadata } from "../types"
import { ZBase32Codec } from "../encoding/ZBase32Codec"
import { SNOWFLAKE_EPOCH, SnowflakeLayout } from "./SnowflakeLayout"
import { SnowflakeValue } from "./SnowflakeValue"

/**
 * Any representation of an id the parser accepts.
 *
 *   - bigint         → the id itself
 *   - string         → 13-character z-base-32 form
 *   - SnowflakeValue → first-class id object
 */
export type SnowflakeInput = bigint | string | SnowflakeValue

// ─────────────────────────────────────────────────────────────────────────────
// SnowflakeParser
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads the fields and creation time back out of an id.
 *
 * A pure structural decode: any 64-bit value parses. Parsing says nothing
 * about whether an id was ever issued.
 */
export class SnowflakeParser {
  /**
   * Returns the creation time embedded in an id, with millisecond precision.
   * Total: every bigint maps to a Date.
   *
   * @param id - Signed or unsigned 64-bit id.
   */
  static generationTime(id: bigint): Date {
    const { timestamp } = SnowflakeLayout.decompose(id)
    return new Date(timestamp + SNOWFLAKE_EPOCH)
  }

  /**
   * Parses an id into frozen SnowflakeMetadata.
   *
   * @param input - bigint, encoded string or SnowflakeValue.
   * @returns Fields plus the creation time as Unix ms, Date and ISO string.
   *
   * @throws {TypeError} Unsupported input type.
   * @throws {Error}     String input does not decode.
   *
   * @example
   * ```ts
   * const meta = SnowflakeParser.parse("yrbgh1ofyyyyb")
   * console.log(meta.iso)      // creation time
   * console.log(meta.nodeId)   // 0–1023
   * ```
   */
  static parse(input: SnowflakeInput): SnowflakeMetadata {
    const id = SnowflakeParser.normalizeToBigInt(input)
    const { timestamp, nodeId, sequence } = SnowflakeLayout.decompose(id)
    const date = new Date(timestamp + SNOWFLAKE_EPOCH)

    return Object.freeze({
      id,
      timestamp: date.getTime(),
      date,
      iso: date.toISOString(),
      nodeId,
      sequence,
    })
  }

  /**
   * Normalizes any accepted input to a signed 64-bit bigint. Unlike
   * ZBase32Codec.decode, failures throw.
   */
  private static normalizeToBigInt(input: SnowflakeInput): bigint {
    if (input instanceof SnowflakeValue) {
      return input.toBigInt()
    }

    if (typeof input === "bigint") {
      return BigInt.asIntN(64, input)
    }

    if (typeof input === "string") {
      const trimmed = input.trim()
      const result = ZBase32Codec.decode(trimmed)

      if (!result.ok) {
        throw new Error(
          `SnowflakeParser: cannot decode "${trimmed}" (${result.reason}). ` +
          `Ids are 13 characters from the z-base-32 alphabet.`
        )
      }

      return result.id
    }

    throw new TypeError(
      `SnowflakeParser: unsupported input type "${typeof input}". ` +
      `Accepted: bigint, string, SnowflakeValue.`
    )
  }
}
