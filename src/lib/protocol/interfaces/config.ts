import type { ChecksumAccumulator } from "./checksum.ts";

/**
 * Frame reader configuration
 *
 * Controls how decoded packets are buffered and how frames are verified.
 */
export interface ReaderConfig {
  /**
   * Number of decoded packets the output channel holds before the reader
   * suspends until a consumer makes room
   */
  channelCapacity: number;

  /**
   * Checksum used to validate every frame
   *
   * Must follow the incremental contract described on ChecksumAccumulator.
   */
  accumulator: ChecksumAccumulator;
}
