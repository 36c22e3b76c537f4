// Constants
export * from "./constants.ts";

// Enums
export * from "./packet-types.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Codecs
export {
  PrimaryHeaderCodec,
  SecondaryHeaderCodec,
  UserDataFieldCodec,
} from "./codecs/index.ts";

// Checksum
export { Crc16Accumulator, crc16Accumulator } from "./checksum/crc16.ts";

// Packet
export { SpacePacket } from "./packet.ts";
