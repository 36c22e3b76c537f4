/**
 * Packet type identifiers
 *
 * Single bit at position 12 of the first primary header word.
 *
 * ## Overview
 *
 * - Telemetry packets flow from the spacecraft/instrument to the ground
 * - Telecommand packets flow from the ground to the spacecraft/instrument
 */
export enum PacketType {
  /**
   * 0: TELEMETRY (downlink)
   */
  TELEMETRY = 0,

  /**
   * 1: TELECOMMAND (uplink)
   */
  TELECOMMAND = 1,
}

/**
 * Sequence flags (2 bits) describing where a packet sits in a segmented group
 *
 * Unsegmented user data (the common case) is flagged as 0b11.
 */
export enum SequenceFlags {
  /** 0b00: continuation segment of a group */
  CONTINUATION = 0,
  /** 0b01: first segment of a group */
  FIRST_SEGMENT = 1,
  /** 0b10: last segment of a group */
  LAST_SEGMENT = 2,
  /** 0b11: stand-alone packet */
  UNSEGMENTED = 3,
}

const PACKET_TYPES: ReadonlyMap<number, PacketType> = new Map([
  [0, PacketType.TELEMETRY],
  [1, PacketType.TELECOMMAND],
]);

const SEQUENCE_FLAGS: ReadonlyMap<number, SequenceFlags> = new Map([
  [0, SequenceFlags.CONTINUATION],
  [1, SequenceFlags.FIRST_SEGMENT],
  [2, SequenceFlags.LAST_SEGMENT],
  [3, SequenceFlags.UNSEGMENTED],
]);

/**
 * Maps a raw packet type code to its enum member
 * @returns The packet type, or null if the code is not defined
 */
export function toPacketType(code: number): PacketType | null {
  return PACKET_TYPES.get(code) ?? null;
}

/**
 * Maps a raw 2-bit sequence flags code to its enum member
 * @returns The sequence flags, or null if the code is not defined
 */
export function toSequenceFlags(code: number): SequenceFlags | null {
  return SEQUENCE_FLAGS.get(code) ?? null;
}

/**
 * Short display name for a packet type ("TM" / "TC")
 */
export function packetTypeLabel(type: PacketType): string {
  return type === PacketType.TELECOMMAND ? "TC" : "TM";
}
