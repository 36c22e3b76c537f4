/**
 * Running checksum over a frame
 *
 * Implementations must be incremental: accumulating `a` then `b` yields the
 * same state as accumulating `a ++ b` in one call. This lets the header and the
 * data field be checksummed separately, as the reader receives them.
 *
 * The state is an opaque number owned by the implementation.
 */
export interface ChecksumAccumulator {
  /** State before any byte has been consumed */
  initial(): number;

  /** Continues the state over `bytes` */
  accumulate(state: number, bytes: Uint8Array): number;

  /**
   * True when a frame accumulated together with its trailing checksum bytes
   * is self-consistent
   */
  isValid(state: number): boolean;

  /** 16-bit checksum value for the bytes accumulated so far */
  digest(state: number): number;

  /**
   * Continues the state over `bytes` and returns them with the resulting
   * checksum appended (big-endian)
   */
  finalizeAndAppend(state: number, bytes: Uint8Array): Buffer;
}
