export type { ByteSource } from "./byte-source.ts";
export { BufferByteSource, StreamByteSource } from "./byte-source.ts";
export { PacketChannel } from "./packet-channel.ts";
export { FrameReader, ReaderState, createFrameReader } from "./frame-reader.ts";
