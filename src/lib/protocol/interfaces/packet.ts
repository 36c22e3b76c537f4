import type { SecondaryHeader } from "./secondary-header.ts";
import type { UserDataField } from "./user-data-field.ts";
import type { PacketType, SequenceFlags } from "../packet-types.ts";

/**
 * Content of a packet's data field, keyed by which optional parts are present
 *
 * The checksum always closes the data field and is not part of the layout.
 */
export type DataFieldLayout =
  | {
      kind: "secondary-and-user-data";
      secondaryHeader: SecondaryHeader;
      userData: UserDataField;
    }
  | { kind: "secondary-only"; secondaryHeader: SecondaryHeader }
  | { kind: "user-data-only"; userData: UserDataField }
  | { kind: "checksum-only" };

export type DataFieldKind = DataFieldLayout["kind"];

/**
 * A frame split the way the reader receives it
 */
export interface PacketBuffers {
  /** The 6-byte primary header */
  header: Buffer;

  /** The data field: secondary header, user data and checksum */
  body: Buffer;
}

/**
 * Loose field values for composing a packet.
 *
 * The secondary header flag and data length are derived from the
 * components supplied.
 */
export interface PacketFields {
  versionNumber?: number;
  packetType: PacketType;
  apid: number;
  sequenceFlags?: SequenceFlags;
  sequenceCounter: number;
  secondaryHeader?: SecondaryHeader | null;
  userData?: Uint8Array | null;
}
