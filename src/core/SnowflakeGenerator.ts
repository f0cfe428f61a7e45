import * as crypto from "crypto"
import { Clock, TimeUtils } from "../utils/TimeUtils"
import {
  MAX_NODE_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP,
  SNOWFLAKE_EPOCH,
  SnowflakeLayout,
} from "./SnowflakeLayout"

/**
 * Default pause between clock samples while waiting out a sequence overflow.
 * Keeps the wait from pegging a core; the wait itself is sub-millisecond.
 */
const DEFAULT_POLL_INTERVAL_MS = 0.05

/**
 * Environment variable holding an explicit numeric node id.
 */
const NODE_ID_ENV = "SNOWFLAKE_NODE_ID"

export interface SnowflakeGeneratorOptions {
  /**
   * Wall clock in Unix milliseconds. Defaults to TimeUtils.now (Date.now).
   * Tests inject a fake clock here.
   */
  clock?: Clock

  /**
   * Milliseconds to pause between clock samples while waiting for the next
   * tick after 4096 ids in one millisecond. Fractions allowed; 0 spins.
   */
  pollIntervalMs?: number
}

export interface NodeIdResolution {
  /** Resolved node id (0–1023) written into every generated id. */
  nodeId: number
  /** Where the value came from: useful for startup diagnostics. */
  source: "explicit_number" | "explicit_string" | "env" | "pod_ip" | "hostname" | "random"
  /** Set when source is "random", caller should log this prominently. */
  warning?: string
}

/**
 * Resolves a 10-bit node id (0–1023) from config or environment in priority order:
 *
 *   1. Explicit numeric config: used as-is
 *   2. Explicit string config: hashed to 10 bits, deterministic
 *   3. SNOWFLAKE_NODE_ID env: parsed as a decimal integer
 *   4. POD_IP env var: unique per pod in Kubernetes (Downward API)
 *   5. HOSTNAME env var: unique per container in Docker / ECS
 *   6. Random fallback: warns; safe only for single-instance use
 *
 * Hashing strings into 1024 slots collides often once more than a few dozen
 * nodes run. Fleets of that size should set numeric ids.
 */
export class NodeIdResolver {
  /**
   * @param explicitNodeId - Configured node id, numeric or a string to hash.
   * @param env            - Environment to read; defaults to process.env.
   * @returns The node id and where it came from.
   *
   * @throws {RangeError} Explicit number, or SNOWFLAKE_NODE_ID, outside 0–1023.
   * @throws {TypeError}  Explicit string is empty.
   */
  static resolve(explicitNodeId?: number | string, env: NodeJS.ProcessEnv = process.env): NodeIdResolution {
    // 1. Explicit numeric config
    if (typeof explicitNodeId === "number") {
      NodeIdResolver.assertNodeId(explicitNodeId, "explicit nodeId")
      return { nodeId: explicitNodeId, source: "explicit_number" }
    }

    // 2. Explicit string config
    if (typeof explicitNodeId === "string") {
      if (explicitNodeId.trim().length === 0) {
        throw new TypeError(
          `zflake: nodeId string must not be empty. ` +
          `Provide a non-empty string or a numeric value 0–${MAX_NODE_ID}.`
        )
      }
      return {
        nodeId: NodeIdResolver.hashToNodeId(explicitNodeId.trim()),
        source: "explicit_string",
      }
    }

    // 3. SNOWFLAKE_NODE_ID
    const fromEnv = env[NODE_ID_ENV]
    if (fromEnv !== undefined && fromEnv.trim().length > 0) {
      const trimmed = fromEnv.trim()
      const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN
      NodeIdResolver.assertNodeId(parsed, NODE_ID_ENV)
      return { nodeId: parsed, source: "env" }
    }

    // 4. POD_IP
    const podIp = env.POD_IP
    if (podIp && podIp.trim().length > 0) {
      return { nodeId: NodeIdResolver.hashToNodeId(podIp.trim()), source: "pod_ip" }
    }

    // 5. HOSTNAME
    const hostname = env.HOSTNAME
    if (hostname && hostname.trim().length > 0) {
      return { nodeId: NodeIdResolver.hashToNodeId(hostname.trim()), source: "hostname" }
    }

    // 6. Random fallback
    const randomNodeId = crypto.randomInt(0, MAX_NODE_ID + 1)
    return {
      nodeId: randomNodeId,
      source: "random",
      warning:
        `[zflake] WARNING: nodeId randomly assigned (nodeId=${randomNodeId}). ` +
        `Safe for single-instance use only. In distributed deployments this risks ` +
        `ID collision. Fix: set ${NODE_ID_ENV}, inject POD_IP (Kubernetes), ` +
        `or pass nodeId explicitly: Snowflake.initialize({ nodeId: 42 }).`,
    }
  }

  /**
   * Hashes a string to a stable node id (0–1023).
   * Reads the first 2 bytes of its SHA-256 digest big-endian and keeps the low 10 bits.
   */
  static hashToNodeId(input: string): number {
    const hash = crypto.createHash("sha256").update(input, "utf8").digest()
    return ((hash[0] << 8) | hash[1]) & MAX_NODE_ID
  }

  private static assertNodeId(value: number, label: string): void {
    if (!SnowflakeLayout.isValidNodeId(value)) {
      throw new RangeError(
        `zflake: ${label} must be an integer between 0 and ${MAX_NODE_ID}. ` +
        `Received: ${value}`
      )
    }
  }
}

/**
 * Clock-and-sequence state machine that mints Snowflake ids.
 *
 * Each instance owns its own (lastTimestamp, sequence) pair, initialised to
 * (0, 0). Several generators can coexist in one process; they never share
 * state.
 *
 * Uniqueness guarantee:
 *   Within a generator → timestamp + sequence (4096 ids/ms; blocks on overflow)
 *   Across generators  → nodeId (holds as long as no two live generators use
 *                        the same nodeId)
 *
 * Thread safety:
 *   generate() is synchronous and never yields, so the event loop serialises
 *   every caller on a thread and the state update is one critical section.
 *   Worker threads do not share this state: instantiate one per Worker,
 *   each with its own nodeId.
 *
 * Known limitation:
 *   The overflow wait has no timeout. If the clock never advances the call
 *   never returns. Callers needing bounded latency must enforce their own
 *   deadline around the process.
 */
export class SnowflakeGenerator {
  /** Epoch-relative millisecond timestamp of the most recently generated id. */
  private lastTimestamp: number = 0

  /** Sequence counter within lastTimestamp. */
  private sequence: number = 0

  /** Set while generate() holds the state. */
  private locked: boolean = false

  private readonly clock: Clock
  private readonly pollIntervalMs: number

  /**
   * @throws {TypeError}  clock is not a function.
   * @throws {RangeError} pollIntervalMs is negative or not finite.
   */
  constructor(options: SnowflakeGeneratorOptions = {}) {
    const clock = options.clock ?? TimeUtils.now
    if (typeof clock !== "function") {
      throw new TypeError(
        `zflake: clock must be a function returning Unix milliseconds. ` +
        `Received: ${typeof clock}`
      )
    }

    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
      throw new RangeError(
        `zflake: pollIntervalMs must be a finite number >= 0. ` +
        `Received: ${pollIntervalMs}`
      )
    }

    this.clock = clock
    this.pollIntervalMs = pollIntervalMs
  }

  /**
   * Mints the next id for `nodeId`.
   *
   * Ids from one generator are strictly increasing. Up to 4096 ids per
   * millisecond; the 4097th waits for the clock to tick.
   *
   * @param nodeId - Integer 0–1023. Supplied per call, not fixed at construction.
   *
   * @throws {RangeError} nodeId outside 0–1023 (programming error, not recoverable),
   *                      or clock outside the 42-bit range after the epoch.
   * @throws {Error}      Called re-entrantly from inside the clock.
   */
  generate(nodeId: number): bigint {
    if (!SnowflakeLayout.isValidNodeId(nodeId)) {
      throw new RangeError(
        `zflake: nodeId must be an integer between 0 and ${MAX_NODE_ID}. ` +
        `Received: ${nodeId}`
      )
    }

    if (this.locked) {
      throw new Error(
        `zflake: generate() was re-entered while already running. ` +
        `The clock passed to SnowflakeGenerator must not generate ids.`
      )
    }

    this.locked = true
    try {
      const { timestamp, sequence } = this.nextTimestampAndSequence()
      return SnowflakeLayout.compose({ timestamp, nodeId, sequence })
    } finally {
      this.locked = false
    }
  }

  /** Epoch-relative timestamp of the last id, or 0 before the first call. */
  getLastTimestamp(): number {
    return this.lastTimestamp
  }

  /** Sequence value of the last id. */
  getSequence(): number {
    return this.sequence
  }

  /**
   * Returns the next monotonic { timestamp, sequence } pair:
   *   - Holds at lastTimestamp when the clock steps backward
   *   - Increments sequence within the same millisecond
   *   - Waits for the clock when sequence wraps, rather than reusing a pair
   */
  private nextTimestampAndSequence(): { timestamp: number; sequence: number } {
    let timestamp = this.currentTimestamp()

    if (timestamp < this.lastTimestamp) {
      timestamp = this.lastTimestamp
    }

    let sequence = 0

    if (timestamp === this.lastTimestamp) {
      sequence = (this.sequence + 1) & MAX_SEQUENCE

      if (sequence === 0) {
        timestamp = this.waitForNextMillisecond(this.lastTimestamp)
      }
    }

    // State is committed only once the pair is final; a throwing wait leaves it untouched.
    this.lastTimestamp = timestamp
    this.sequence = sequence
    return { timestamp, sequence }
  }

  private waitForNextMillisecond(sinceTimestamp: number): number {
    let now = this.currentTimestamp()

    while (now <= sinceTimestamp) {
      TimeUtils.pause(this.pollIntervalMs)
      now = this.currentTimestamp()
    }

    return now
  }

  /**
   * Samples the clock as whole milliseconds since SNOWFLAKE_EPOCH.
   *
   * @throws {RangeError} Clock reads before the epoch or beyond 42 bits.
   */
  private currentTimestamp(): number {
    const timestamp = Math.floor(this.clock()) - SNOWFLAKE_EPOCH

    if (!Number.isSafeInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIMESTAMP) {
      throw new RangeError(
        `zflake: clock is outside the representable range. ` +
        `Epoch-relative timestamp ${timestamp} must be between 0 and ${MAX_TIMESTAMP}. ` +
        `Check system clock integrity (NTP sync, container time, VM migration).`
      )
    }

    return timestamp
  }
}
