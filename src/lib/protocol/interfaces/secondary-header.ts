/**
 * Optional secondary header carrying the packet timestamp
 *
 * Wire layout (8 bytes, big-endian): `[0-3] timeWeek`, `[4-7] timeMs`.
 */
export interface SecondaryHeader {
  /** Week number (u32) */
  readonly timeWeek: number;

  /** Milliseconds into the week (u32) */
  readonly timeMs: number;
}
