/**
 * z-base-32 alphabet. Digit value = index.
 *
 * The ordering puts the easiest-to-read symbols on the most common digits and
 * leaves out 0, l, v and 2, which are easily confused with o, 1, u and z.
 * 'y' is the zero digit, so it is also the padding symbol.
 */
export const ALPHABET = "ybndrfg8ejkmcpqxot1uwisza345h769"

/**
 * Character length of an encoded id.
 * 64 bits ÷ 5 bits/char = 12.8 → 13 characters. The leading character only
 * carries the top 4 bits, so it is one of the first 16 symbols ('y' … 'x').
 */
export const ENCODED_LENGTH = 13

/** Number of bits encoded per character. */
const BITS_PER_CHAR = 5n

/** 0b11111: extracts one digit. */
const CHAR_MASK = 31n

/** Largest unsigned 64-bit value. Decoded values above this overflow the id. */
const UINT64_MAX = (1n << 64n) - 1n

/** Marks a byte that is not an alphabet symbol in DECODE_LOOKUP. */
const INVALID = 0xff

/** Largest byte value. Any UTF-16 code unit above it is rejected before lookup. */
const MAX_BYTE = 0xff

/**
 * Result of ZBase32Codec.decode(). Check `ok` before reading `id`.
 */
export type DecodeResult =
  | { ok: true; id: bigint }
  | { ok: false; reason: DecodeFailureReason }

/**
 * All reasons a decode can fail.
 */
export type DecodeFailureReason =
  | "INVALID_LENGTH" // input is not exactly 13 symbols
  | "INVALID_SYMBOL" // input contains a byte outside the alphabet
  | "OVERFLOW"       // value does not fit in 64 bits (leading symbol beyond 'x')

/**
 * Fixed-width z-base-32 codec for 64-bit ids.
 *
 * Encoded form:
 *   - Exactly 13 lowercase ASCII characters from ALPHABET
 *   - Most-significant digit first, left-padded with 'y' (the zero digit)
 *
 * The alphabet is not in ASCII order, so encoded strings do not sort like
 * the ids they carry. Sort on the decoded bigint.
 *
 * Thirteen symbols span 65 bits. Inputs above 2^64 − 1 are rejected with
 * OVERFLOW, never wrapped, so every id has exactly one encoded form.
 *
 * Stateless. The inverse table is built once when the class loads and never
 * mutated afterwards; no generator is needed to use the codec.
 */
export class ZBase32Codec {
  /**
   * Decode lookup table: byte value → digit (0–31), or INVALID.
   * One slot per byte value (256 entries).
   */
  private static readonly DECODE_LOOKUP: Uint8Array = (() => {
    const table = new Uint8Array(MAX_BYTE + 1).fill(INVALID)

    for (let i = 0; i < ALPHABET.length; i++) {
      table[ALPHABET.charCodeAt(i)] = i
    }

    return table
  })()

  /**
   * Encodes an id to its 13-character form.
   *
   * The id is read as its unsigned 64-bit pattern, so negative ids encode
   * with a leading symbol from 'e' (8) to 'x' (15). Never fails.
   *
   * @param id - Any bigint; only its low 64 bits are encoded.
   * @returns 13-character z-base-32 string.
   *
   * @example
   * ```ts
   * ZBase32Codec.encode(0n)   // "yyyyyyyyyyyyy"
   * ZBase32Codec.encode(33n)  // "yyyyyyyyyyybb"
   * ```
   */
  static encode(id: bigint): string {
    const digits = new Array<string>(ENCODED_LENGTH).fill(ALPHABET[0])
    let value = BigInt.asUintN(64, id)

    // Least-significant digit first, written right to left.
    for (let i = ENCODED_LENGTH - 1; i >= 0 && value > 0n; i--) {
      digits[i] = ALPHABET[Number(value & CHAR_MASK)]
      value >>= BITS_PER_CHAR
    }

    return digits.join("")
  }

  /**
   * Decodes 13 symbols back to an id. Never throws.
   *
   * Accepts a string or raw bytes (e.g. a Buffer read off the wire). Input is
   * case-sensitive: upper-case letters are not alphabet symbols.
   *
   * @param input - Encoded id as a string or ASCII bytes.
   * @returns `{ ok: true, id }` with a signed 64-bit id, or `{ ok: false, reason }`.
   *
   * @example
   * ```ts
   * const result = ZBase32Codec.decode(input)
   * if (!result.ok) {
   *   logger.warn("bad id", { reason: result.reason })
   *   return
   * }
   * use(result.id)
   * ```
   */
  static decode(input: string | Uint8Array): DecodeResult {
    if (input.length !== ENCODED_LENGTH) {
      return { ok: false, reason: "INVALID_LENGTH" }
    }

    let value = 0n

    // 1. Map each symbol to its digit, most significant first
    for (let i = 0; i < ENCODED_LENGTH; i++) {
      const byte = typeof input === "string" ? input.charCodeAt(i) : input[i]

      if (byte > MAX_BYTE) {
        return { ok: false, reason: "INVALID_SYMBOL" }
      }

      const digit = ZBase32Codec.DECODE_LOOKUP[byte]
      if (digit === INVALID) {
        return { ok: false, reason: "INVALID_SYMBOL" }
      }

      value = (value << BITS_PER_CHAR) | BigInt(digit)
    }

    // 2. Reject the 65th bit rather than truncating it
    if (value > UINT64_MAX) {
      return { ok: false, reason: "OVERFLOW" }
    }

    // 3. Reinterpret as signed int64
    return { ok: true, id: BigInt.asIntN(64, value) }
  }

  /** Returns true if `input` decodes to an id. */
  static isValid(input: string | Uint8Array): boolean {
    return ZBase32Codec.decode(input).ok
  }
}
