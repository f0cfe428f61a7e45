/**
 * Raw fields packed into a Snowflake id.
 */
export interface SnowflakeFields {
  /**
   * Milliseconds elapsed since SNOWFLAKE_EPOCH (not the Unix epoch).
   * Stored internally as a 42-bit integer.
   */
  timestamp: number

  /**
   * Generator node identifier (0–1023).
   */
  nodeId: number

  /**
   * Per-millisecond sequence counter (0–4095).
   */
  sequence: number
}

/**
 * Parsed metadata extracted from a Snowflake id.
 */
export interface SnowflakeMetadata {
  /**
   * The id itself, as a signed 64-bit bigint.
   */
  id: bigint

  /**
   * Creation timestamp in milliseconds since Unix epoch.
   */
  timestamp: number

  /**
   * JavaScript Date representation of timestamp.
   */
  date: Date

  /**
   * ISO-8601 string representation of timestamp.
   */
  iso: string

  /**
   * Generator node identifier
   */
  nodeId: number

  /**
   * Per-millisecond sequence counter (0–4095).
   */
  sequence: number
}
