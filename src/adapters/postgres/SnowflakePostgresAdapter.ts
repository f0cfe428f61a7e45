import { SnowflakeValue } from "../../core/SnowflakeValue"

/**
 * Values a driver may hand back for an int8 column: node-postgres returns a
 * decimal string by default, postgres.js a bigint when configured to, and
 * custom type parsers sometimes a number.
 */
export type BigIntColumnValue = string | bigint | number

// ─────────────────────────────────────────────────────────────────────────────
// SnowflakePostgresAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL adapter: converts between Snowflake ids and BIGINT parameters.
 *
 * Ids live in a BIGINT column. ORDER BY id sorts by creation time and
 * keyset pagination is a range scan on the primary key.
 *
 * Schema:
 *   ```sql
 *   CREATE TABLE users (
 *     id    BIGINT PRIMARY KEY,
 *     email TEXT NOT NULL
 *   );
 *   ```
 *
 * Parameters are passed as decimal strings. pg serialises strings verbatim
 * and Postgres casts them to int8.
 */
export class SnowflakePostgresAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Converts an id to a decimal string for a BIGINT parameter.
   *
   * @param input - Id to store.
   * @returns Signed decimal string, e.g. "4194324480".
   *
   * @throws {TypeError} input is not a SnowflakeValue or bigint.
   *
   * @example
   * ```ts
   * await db.query(
   *   "INSERT INTO users (id, email) VALUES ($1, $2)",
   *   [SnowflakePostgresAdapter.toDatabase(snowflake.generate()), "user@example.com"]
   * )
   * ```
   */
  static toDatabase(input: SnowflakeValue | bigint): string {
    if (input instanceof SnowflakeValue) {
      return input.toDecimalString()
    }

    if (typeof input === "bigint") {
      return BigInt.asIntN(64, input).toString()
    }

    throw new TypeError(
      `SnowflakePostgresAdapter.toDatabase: input must be a SnowflakeValue or bigint. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a BIGINT column value back to a SnowflakeValue.
   *
   * @param value - Column value as the driver returned it.
   *
   * @throws {TypeError}  value is not a string, bigint or number.
   * @throws {RangeError} number is not a safe integer (precision already lost),
   *                      or value is outside the signed 64-bit range.
   * @throws {Error}      string is not a decimal integer.
   *
   * @example
   * ```ts
   * const result = await db.query("SELECT id FROM users WHERE email = $1", [email])
   * const id = SnowflakePostgresAdapter.fromDatabase(result.rows[0].id)
   * console.log(id.toString())
   * ```
   */
  static fromDatabase(value: BigIntColumnValue): SnowflakeValue {
    if (typeof value === "string") {
      return SnowflakeValue.fromDecimalString(value)
    }

    if (typeof value === "bigint") {
      if (BigInt.asIntN(64, value) !== value) {
        throw new RangeError(
          `SnowflakePostgresAdapter.fromDatabase: ${value} is outside the signed 64-bit range.`
        )
      }
      return SnowflakeValue.fromBigInt(value)
    }

    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) {
        throw new RangeError(
          `SnowflakePostgresAdapter.fromDatabase: ${value} is not a safe integer. ` +
          `Configure the driver to return int8 columns as strings or bigints.`
        )
      }
      return SnowflakeValue.fromBigInt(BigInt(value))
    }

    throw new TypeError(
      `SnowflakePostgresAdapter.fromDatabase: expected a string, bigint or number. ` +
      `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
      `Ensure the column is defined as BIGINT.`
    )
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Converts an encoded id (from a URL, request body or header) to a BIGINT
   * parameter.
   *
   * @param encoded - 13-character encoded id.
   * @returns Signed decimal string.
   *
   * @throws {Error} encoded does not decode.
   */
  static fromString(encoded: string): string {
    return SnowflakePostgresAdapter.toDatabase(SnowflakeValue.fromString(encoded))
  }

  // ─── Cursor pagination helper ─────────────────────────────────────────────

  /**
   * Builds the parameter for keyset pagination from the last id a client saw.
   *
   * @param lastSeenId - Encoded id of the last row on the previous page.
   * @returns Signed decimal string for `WHERE id > $1`.
   *
   * @example
   * ```ts
   * // GET /users?after=yrbgh1ofyyyyb
   * const cursor = SnowflakePostgresAdapter.toCursor(req.query.after)
   * const result = await db.query(
   *   `SELECT id, email FROM users
   *    WHERE id > $1
   *    ORDER BY id ASC
   *    LIMIT 50`,
   *   [cursor]
   * )
   * ```
   */
  static toCursor(lastSeenId: string): string {
    return SnowflakePostgresAdapter.fromString(lastSeenId)
  }
}
