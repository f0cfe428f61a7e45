import { SnowflakeFields } from "../types"

/**
 * Custom epoch: 2010-11-04T01:42:54.657Z, in milliseconds since the Unix epoch.
 * Every timestamp field is measured from this instant.
 */
export const SNOWFLAKE_EPOCH = 1288834974657

/** Width of each field, most-significant first. */
export const TIMESTAMP_BITS = 42
export const NODE_ID_BITS = 10
export const SEQUENCE_BITS = 12

/** Largest epoch-relative timestamp that fits in 42 bits (~year 2149). */
export const MAX_TIMESTAMP = 2 ** TIMESTAMP_BITS - 1

/** Largest node id (1023). */
export const MAX_NODE_ID = 2 ** NODE_ID_BITS - 1

/** Largest per-millisecond sequence value (4095). */
export const MAX_SEQUENCE = 2 ** SEQUENCE_BITS - 1

/**
 * Bit positions of each field inside the 64-bit id.
 *
 *   ┌────────────────┬──────────┬──────────┐
 *   │   Timestamp    │  NodeId  │ Sequence │
 *   │  42 bits << 22 │ 10 << 12 │ 12 << 0  │
 *   └────────────────┴──────────┴──────────┘
 */
const NODE_ID_SHIFT = BigInt(SEQUENCE_BITS)
const TIMESTAMP_SHIFT = BigInt(NODE_ID_BITS + SEQUENCE_BITS)

const NODE_ID_MASK = BigInt(MAX_NODE_ID)
const SEQUENCE_MASK = BigInt(MAX_SEQUENCE)
const TIMESTAMP_MASK = BigInt(MAX_TIMESTAMP)

/**
 * Bit-packing for Snowflake ids.
 *
 * Ids are 64-bit signed integers carried as bigint. Values are always
 * normalised through BigInt.asIntN(64), so an id whose timestamp sets the top
 * bit (after ~2080) is negative, exactly as it would be in an int64 column.
 */
export class SnowflakeLayout {
  /**
   * Packs the three fields into one id.
   *
   * @param fields - Epoch-relative timestamp, node id and sequence.
   * @returns Signed 64-bit id.
   *
   * @throws {RangeError} Any field is not an integer or exceeds its bit width.
   */
  static compose(fields: SnowflakeFields): bigint {
    SnowflakeLayout.assertField("timestamp", fields.timestamp, MAX_TIMESTAMP)
    SnowflakeLayout.assertField("nodeId", fields.nodeId, MAX_NODE_ID)
    SnowflakeLayout.assertField("sequence", fields.sequence, MAX_SEQUENCE)

    const packed =
      (BigInt(fields.timestamp) << TIMESTAMP_SHIFT) |
      (BigInt(fields.nodeId) << NODE_ID_SHIFT) |
      BigInt(fields.sequence)

    return BigInt.asIntN(64, packed)
  }

  /**
   * Splits an id into its fields. Total: any bigint is read as its low 64 bits.
   *
   * @returns Fields with the timestamp relative to SNOWFLAKE_EPOCH.
   */
  static decompose(id: bigint): SnowflakeFields {
    const unsigned = BigInt.asUintN(64, id)

    return {
      timestamp: Number((unsigned >> TIMESTAMP_SHIFT) & TIMESTAMP_MASK),
      nodeId: Number((unsigned >> NODE_ID_SHIFT) & NODE_ID_MASK),
      sequence: Number(unsigned & SEQUENCE_MASK),
    }
  }

  /** Returns true if `nodeId` is an integer in 0–1023. */
  static isValidNodeId(nodeId: number): boolean {
    return Number.isInteger(nodeId) && nodeId >= 0 && nodeId <= MAX_NODE_ID
  }

  private static assertField(name: keyof SnowflakeFields, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new RangeError(
        `zflake: ${name} must be an integer between 0 and ${max}. ` +
        `Received: ${value}`
      )
    }
  }
}
