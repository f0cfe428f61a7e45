/**
 * Signature of a millisecond wall clock. Returns milliseconds since the
 * Unix epoch, like Date.now().
 */
export type Clock = () => number

/**
 * Shared cell used as the wait target for pause(). Nothing ever notifies it,
 * so every wait runs to its timeout.
 */
const PAUSE_CELL = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT))

/**
 * Millisecond clock and synchronous pause used by the generator.
 */
export class TimeUtils {
  /**
   * Returns the current Unix timestamp in milliseconds.
   *
   * Date.now() can go backward on NTP sync; SnowflakeGenerator handles that.
   */
  static now(): number {
    return Date.now()
  }

  /**
   * Blocks the calling thread for roughly `ms` milliseconds without burning
   * a core. Fractional values are allowed. A value of 0 or less returns at once.
   */
  static pause(ms: number): void {
    if (!(ms > 0)) {
      return
    }

    Atomics.wait(PAUSE_CELL, 0, 0, ms)
  }
}
