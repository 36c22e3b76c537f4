export type { PrimaryHeader } from "./primary-header.ts";
export type { SecondaryHeader } from "./secondary-header.ts";
export type { UserDataField } from "./user-data-field.ts";
export type { ChecksumAccumulator } from "./checksum.ts";
export type {
  DataFieldLayout,
  DataFieldKind,
  PacketBuffers,
  PacketFields,
} from "./packet.ts";
export type { ReaderConfig } from "./config.ts";
export { DEFAULT_READER_CONFIG } from "./defaults.ts";
