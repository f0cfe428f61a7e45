import { SnowflakeMetadata } from "../types"
import { DecodeResult, ZBase32Codec } from "../encoding/ZBase32Codec"
import { Clock } from "../utils/TimeUtils"
import { NodeIdResolver, SnowflakeGenerator } from "./SnowflakeGenerator"
import { SnowflakeInput, SnowflakeParser } from "./SnowflakeParser"
import { SnowflakeValue } from "./SnowflakeValue"

/**
 * Input shape for Snowflake.initialize().
 *
 * nodeId (optional):
 *   Unique identifier for this instance. Accepts number (0–1023) or string
 *   (hashed to a stable 10-bit value). If omitted, resolved from the
 *   environment: SNOWFLAKE_NODE_ID → POD_IP → HOSTNAME → random (with warning).
 *
 * See also: NodeIdResolver for auto-detection details.
 */
export interface SnowflakeInitOptions {
  nodeId?: number | string
  pollIntervalMs?: number
  clock?: Clock
  env?: NodeJS.ProcessEnv
}

/**
 * Snowflake: the single entry point for generating, encoding and parsing ids.
 *
 * Create one instance per process (or per Worker) and reuse it: the
 * generator it owns holds the sequence state that keeps ids unique.
 *
 * Usage:
 * const snowflake = Snowflake.initialize({ nodeId: 42 })
 *
 * const id   = snowflake.generate()        // SnowflakeValue
 * const text = id.toString()               // "yrbgh1ofyyyyb"-style
 * const meta = snowflake.parse(text)       // { iso, nodeId, sequence, ... }
 */
export class Snowflake {
  private readonly nodeId: number
  private readonly generator: SnowflakeGenerator

  private constructor(options: SnowflakeInitOptions) {
    const resolution = NodeIdResolver.resolve(options.nodeId, options.env)

    if (resolution.warning) {
      console.warn(resolution.warning)
    }

    this.nodeId = resolution.nodeId
    this.generator = new SnowflakeGenerator({
      clock: options.clock,
      pollIntervalMs: options.pollIntervalMs,
    })
  }

  /**
   * Creates a configured Snowflake instance.
   *
   * @param options - nodeId, clock, pollIntervalMs and env overrides; all optional.
   *
   * @throws {TypeError}  Empty string nodeId, or clock is not a function.
   * @throws {RangeError} Numeric nodeId or SNOWFLAKE_NODE_ID outside 0–1023;
   *                      negative pollIntervalMs.
   */
  static initialize(options: SnowflakeInitOptions = {}): Snowflake {
    return new Snowflake(options)
  }

  /**
   * Generates a new id stamped with this instance's nodeId.
   *
   * Throughput: up to 4096 ids/ms. The 4097th in a millisecond waits for
   * the next tick.
   */
  generate(): SnowflakeValue {
    return new SnowflakeValue(this.generateId())
  }

  /** Same as generate(), without the value object. */
  generateId(): bigint {
    return this.generator.generate(this.nodeId)
  }

  /**
   * @param id - Id to encode.
   * @returns 13-character z-base-32 string.
   */
  encode(id: bigint | SnowflakeValue): string {
    return ZBase32Codec.encode(id instanceof SnowflakeValue ? id.toBigInt() : id)
  }

  /** Soft-failing decode; see ZBase32Codec.decode. */
  decode(input: string | Uint8Array): DecodeResult {
    return ZBase32Codec.decode(input)
  }

  /**
   * @param input - bigint, encoded string or SnowflakeValue.
   *
   * @throws {Error} String input does not decode.
   */
  parse(input: SnowflakeInput): SnowflakeMetadata {
    return SnowflakeParser.parse(input)
  }

  generationTime(id: bigint | SnowflakeValue): Date {
    return SnowflakeParser.generationTime(id instanceof SnowflakeValue ? id.toBigInt() : id)
  }

  // ─── Diagnostics ─────────────────────────────────────────────────────────

  /**
   * Returns the resolved nodeId embedded in every id generated by this instance.
   *
   * @example
   * ```ts
   * logger.info("id generator ready", { nodeId: snowflake.getNodeId() })
   * ```
   */
  getNodeId(): number {
    return this.nodeId
  }
}
