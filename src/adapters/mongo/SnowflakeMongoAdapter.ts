import { Long } from "bson"
import { SnowflakeValue } from "../../core/SnowflakeValue"

/**
 * Shape of a MongoDB document field storing a Snowflake id.
 *
 * @example
 * ```ts
 * interface UserDocument {
 *   _id: SnowflakeDocument
 *   email: string
 * }
 * ```
 */
export type SnowflakeDocument = Long

// ─────────────────────────────────────────────────────────────────────────────
// SnowflakeMongoAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * MongoDB adapter: converts between Snowflake ids and BSON Long (int64).
 *
 * Ids are stored as BSON Long so that _id compares numerically and range
 * queries follow creation time. A JS number cannot hold them: ids exceed
 * Number.MAX_SAFE_INTEGER.
 *
 * Setup:
 *   ```ts
 *   await collection.insertOne({
 *     _id: SnowflakeMongoAdapter.toDatabase(snowflake.generate()),
 *   })
 *   ```
 *
 * Query pattern:
 *   ```ts
 *   const key = SnowflakeMongoAdapter.fromString(req.params.id)
 *   const doc = await collection.findOne({ _id: key })
 *   ```
 */
export class SnowflakeMongoAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Converts an id to a signed BSON Long for storage.
   *
   * @param input - Id to store.
   *
   * @throws {TypeError} input is not a SnowflakeValue or bigint.
   */
  static toDatabase(input: SnowflakeValue | bigint): Long {
    return Long.fromBigInt(SnowflakeMongoAdapter.resolveToBigInt(input, "toDatabase"))
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a BSON Long retrieved from MongoDB back to a SnowflakeValue.
   *
   * @param value - Signed or unsigned Long read from the document.
   *
   * @throws {TypeError} value is not a BSON Long.
   */
  static fromDatabase(value: Long): SnowflakeValue {
    if (!Long.isLong(value)) {
      throw new TypeError(
        `SnowflakeMongoAdapter.fromDatabase: expected a BSON Long. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
        `Ensure the field was stored using SnowflakeMongoAdapter.toDatabase().`
      )
    }

    // Unsigned Longs hold the same 64 bits; SnowflakeValue re-reads them as signed.
    return SnowflakeValue.fromBigInt(value.toBigInt())
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Converts an encoded id straight to a Long for use in a query filter.
   *
   * @param encoded - 13-character encoded id.
   *
   * @throws {Error} encoded does not decode.
   */
  static fromString(encoded: string): Long {
    return SnowflakeMongoAdapter.toDatabase(SnowflakeValue.fromString(encoded))
  }

  /** Alias for fromDatabase(): use whichever reads more clearly. */
  static toSnowflakeValue(value: Long): SnowflakeValue {
    return SnowflakeMongoAdapter.fromDatabase(value)
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static resolveToBigInt(
    input: SnowflakeValue | bigint,
    callerName: string
  ): bigint {
    if (input instanceof SnowflakeValue) {
      return input.toBigInt()
    }

    if (typeof input === "bigint") {
      return BigInt.asIntN(64, input)
    }

    throw new TypeError(
      `SnowflakeMongoAdapter.${callerName}: input must be a SnowflakeValue or bigint. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }
}
