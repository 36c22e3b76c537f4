import type { SpacePacket } from "../protocol/index.ts";
import { packetTypeLabel, SequenceFlags } from "../protocol/index.ts";

/**
 * JSON-friendly view of a packet; binary fields are lowercase hex
 */
export interface PacketJSON {
  versionNumber: number;
  packetType: string;
  secondaryHeaderFlag: boolean;
  apid: number;
  sequenceFlags: string;
  sequenceCounter: number;
  dataLength: number;
  secondaryHeader: { timeWeek: number; timeMs: number } | null;
  userData: string | null;
  checksum: string;
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

export function formatChecksum(checksum: number): string {
  return `0x${checksum.toString(16).padStart(4, "0")}`;
}

export function sequenceFlagsLabel(flags: SequenceFlags): string {
  return SequenceFlags[flags];
}

export function packetToJSON(packet: SpacePacket): PacketJSON {
  const header = packet.primaryHeader;
  return {
    versionNumber: header.versionNumber,
    packetType: packetTypeLabel(header.packetType),
    secondaryHeaderFlag: header.secondaryHeaderFlag,
    apid: header.apid,
    sequenceFlags: sequenceFlagsLabel(header.sequenceFlags),
    sequenceCounter: header.sequenceCounter,
    dataLength: header.dataLength,
    secondaryHeader: packet.secondaryHeader
      ? {
          timeWeek: packet.secondaryHeader.timeWeek,
          timeMs: packet.secondaryHeader.timeMs,
        }
      : null,
    userData: packet.userData ? toHex(packet.userData.data) : null,
    checksum: toHex(Buffer.from([packet.checksum >> 8, packet.checksum & 0xff])),
  };
}

/**
 * One-line description, e.g. `APID 115 TM UNSEGMENTED #291 22 bytes crc 0xc1f8`
 */
export function formatPacketSummary(packet: SpacePacket): string {
  const header = packet.primaryHeader;
  return [
    `APID ${header.apid}`,
    packetTypeLabel(header.packetType),
    sequenceFlagsLabel(header.sequenceFlags),
    `#${header.sequenceCounter}`,
    `${packet.frameSize} bytes`,
    `crc ${formatChecksum(packet.checksum)}`,
  ].join(" ");
}

/**
 * Multi-line description of every field
 */
export function formatPacket(packet: SpacePacket): string {
  const header = packet.primaryHeader;
  const lines = [
    `Packet APID ${header.apid} (${packetTypeLabel(header.packetType)})`,
    `  version:          ${header.versionNumber}`,
    `  sequence:         ${sequenceFlagsLabel(header.sequenceFlags)} #${header.sequenceCounter}`,
    `  data length:      ${header.dataLength}`,
  ];

  if (packet.secondaryHeader) {
    lines.push(
      `  secondary header: week ${packet.secondaryHeader.timeWeek}, ms ${packet.secondaryHeader.timeMs}`,
    );
  }
  if (packet.userData) {
    lines.push(
      `  user data:        ${toHex(packet.userData.data)} (${packet.userData.data.length} bytes)`,
    );
  }
  lines.push(`  checksum:         ${formatChecksum(packet.checksum)}`);

  return lines.join("\n");
}
