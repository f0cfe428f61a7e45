/**
 * tests/unit/encoding/zbase32-codec.test.ts: ZBase32Codec unit tests
 *
 * Verifies the fixed-width encoding: pinned padding vectors, round trips
 * (including ids below 32), and every decode rejection reason.
 */

import { ALPHABET, ENCODED_LENGTH, ZBase32Codec } from "../../../src/encoding/ZBase32Codec"

describe("ZBase32Codec", () => {
  // ── Encode ────────────────────────────────────────────────────────

  test("ZB32_01: zero encodes as thirteen zero symbols", () => {
    expect(ZBase32Codec.encode(0n)).toBe("yyyyyyyyyyyyy")
  })

  test("ZB32_02: small ids are left-padded with 'y'", () => {
    expect(ZBase32Codec.encode(1n)).toBe("yyyyyyyyyyyyb")
    expect(ZBase32Codec.encode(31n)).toBe("yyyyyyyyyyyy9")
    expect(ZBase32Codec.encode(32n)).toBe("yyyyyyyyyyyby")
    expect(ZBase32Codec.encode(33n)).toBe("yyyyyyyyyyybb")
  })

  test("ZB32_03: negative ids encode their unsigned 64-bit pattern", () => {
    expect(ZBase32Codec.encode(-1n)).toBe("x999999999999")
    expect(ZBase32Codec.encode(-9223372036854775808n)).toBe("eyyyyyyyyyyyy")
  })

  test("ZB32_04: output is always 13 alphabet symbols", () => {
    const ids = [0n, 7n, 1024n, 4194324480n, 2n ** 40n + 12345n, 2n ** 62n, -42n]
    for (const id of ids) {
      const encoded = ZBase32Codec.encode(id)
      expect(encoded).toHaveLength(ENCODED_LENGTH)
      expect(encoded).toMatch(/^[ybndrfg8ejkmcpqxot1uwisza345h769]{13}$/)
    }
  })

  test("ZB32_05: alphabet has 32 distinct symbols", () => {
    expect(new Set(ALPHABET).size).toBe(32)
  })

  // ── Decode / Roundtrip ────────────────────────────────────────────

  test("ZB32_06: decode(encode(id)) round trips, including ids below 32", () => {
    const ids = [0n, 1n, 5n, 31n, 32n, 33n, 1023n, 4194324480n, 2n ** 63n - 1n, -1n, -9223372036854775808n]
    for (const id of ids) {
      expect(ZBase32Codec.decode(ZBase32Codec.encode(id))).toEqual({ ok: true, id })
    }
  })

  test("ZB32_07: decode accepts raw bytes", () => {
    expect(ZBase32Codec.decode(Buffer.from("yyyyyyyyyyybb", "ascii"))).toEqual({ ok: true, id: 33n })
    expect(ZBase32Codec.decode(new Uint8Array(Buffer.from("x999999999999", "ascii")))).toEqual({
      ok: true,
      id: -1n,
    })
  })

  test("ZB32_08: wrong length is INVALID_LENGTH", () => {
    expect(ZBase32Codec.decode("")).toEqual({ ok: false, reason: "INVALID_LENGTH" })
    expect(ZBase32Codec.decode("yyyyyyyyyyyy")).toEqual({ ok: false, reason: "INVALID_LENGTH" })
    expect(ZBase32Codec.decode("yyyyyyyyyyyyyy")).toEqual({ ok: false, reason: "INVALID_LENGTH" })
  })

  test("ZB32_09: any byte outside the alphabet is INVALID_SYMBOL", () => {
    // 'l', 'v', '0' and '2' are not in the alphabet
    for (const bad of ["l", "v", "0", "2", "Y", " ", "-"]) {
      expect(ZBase32Codec.decode(`yyyyyy${bad}yyyyyy`)).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
    }
  })

  test("ZB32_10: non-ASCII characters are INVALID_SYMBOL", () => {
    expect(ZBase32Codec.decode("yyyyyyyyyyyyé")).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
    expect(ZBase32Codec.decode("yyyyyyyyyyyy€")).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
  })

  test("ZB32_11: null and high bytes are INVALID_SYMBOL", () => {
    const bytes = new Uint8Array(Buffer.from("yyyyyyyyyyyyy", "ascii"))
    bytes[3] = 0x00
    expect(ZBase32Codec.decode(bytes)).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
    bytes[3] = 0xff
    expect(ZBase32Codec.decode(bytes)).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
  })

  test("ZB32_12: values beyond 64 bits are OVERFLOW", () => {
    // 'o' is digit 16: 16 × 32^12 = 2^64
    expect(ZBase32Codec.decode("oyyyyyyyyyyyy")).toEqual({ ok: false, reason: "OVERFLOW" })
    expect(ZBase32Codec.decode("9999999999999")).toEqual({ ok: false, reason: "OVERFLOW" })
  })

  test("ZB32_13: isValid mirrors decode", () => {
    expect(ZBase32Codec.isValid("yyyyyyyyyyybb")).toBe(true)
    expect(ZBase32Codec.isValid("yyyyyyyyyyyb")).toBe(false)
    expect(ZBase32Codec.isValid("yyyyyyyyyyybl")).toBe(false)
  })
})
