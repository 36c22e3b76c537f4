import type { ReaderConfig } from "./config.ts";
import { CHANNEL_CAPACITY } from "../constants.ts";
import { crc16Accumulator } from "../checksum/crc16.ts";

/**
 * Default frame reader configuration
 *
 * - channelCapacity: 1024 - pending packets before the reader blocks
 * - accumulator: CRC-16/CCITT-FALSE - valid frames accumulate to zero
 */
export const DEFAULT_READER_CONFIG: ReaderConfig = {
  channelCapacity: CHANNEL_CAPACITY,
  accumulator: crc16Accumulator,
};
