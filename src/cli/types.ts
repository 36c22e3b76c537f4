import type { PacketType, SequenceFlags } from "../lib/protocol/index.ts";

export type GlobalOptions = {
  verbose: boolean;
  logLevel?: string;
};

export interface DecodeOptions {
  file?: string;
  json: boolean;
  capacity?: number;
  limit?: number;
}

export interface InspectOptions {
  json: boolean;
}

export interface EncodeOptions {
  apid: number;
  type: PacketType;
  sequenceFlags: SequenceFlags;
  sequenceCounter: number;
  packetVersion: number;
  timeWeek?: number;
  timeMs?: number;
  data?: Buffer;
  raw: boolean;
}
