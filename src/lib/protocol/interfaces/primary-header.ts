import type { PacketType, SequenceFlags } from "../packet-types.ts";

/**
 * Decoded primary header
 *
 * Wire layout (6 bytes, big-endian):
 *
 * ```
 * word 0: [15-13] version  [12] type  [11] sec. header flag  [10-0] APID
 * word 1: [15-14] sequence flags      [13-0] sequence counter
 * word 2: [15-0]  data length (data field size - 1)
 * ```
 */
export interface PrimaryHeader {
  /** Packet version number (3 bits, 0-7) */
  readonly versionNumber: number;

  /** Telemetry or telecommand (1 bit) */
  readonly packetType: PacketType;

  /** Whether an 8-byte secondary header opens the data field */
  readonly secondaryHeaderFlag: boolean;

  /**
   * Application process identifier (11 bits, 0-2047)
   */
  readonly apid: number;

  /** Segmentation flags (2 bits) */
  readonly sequenceFlags: SequenceFlags;

  /** Packet sequence count (14 bits, 0-16383) */
  readonly sequenceCounter: number;

  /**
   * Data field length minus one (16 bits, 0-65535)
   *
   * A value of 0x000F announces a 16-byte data field.
   */
  readonly dataLength: number;
}
