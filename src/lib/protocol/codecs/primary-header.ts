import type { PrimaryHeader } from "../interfaces/primary-header.ts";
import { toPacketType, toSequenceFlags } from "../packet-types.ts";
import { DATA_LENGTH_OFFSET, PRIMARY_HEADER_SIZE } from "../constants.ts";
import {
  InvalidFieldError,
  MalformedHeaderError,
  TruncatedFrameError,
} from "../../utils/errors.ts";

/**
 * Primary header codec
 *
 * The primary header is exactly 6 bytes, big-endian:
 *
 * ```
 * [0-1] word 0: version (3) | type (1) | secondary header flag (1) | APID (11)
 * [2-3] word 1: sequence flags (2) | sequence counter (14)
 * [4-5] data length = data field size - 1
 * ```
 *
 * Decoding and encoding are exact inverses: every 6-byte input decodes to a
 * header that encodes back to the same bytes.
 */
export class PrimaryHeaderCodec {
  // Word 0
  private static readonly VERSION_MASK = 0xe000;
  private static readonly VERSION_SHIFT = 13;
  private static readonly TYPE_MASK = 0x1000;
  private static readonly TYPE_SHIFT = 12;
  private static readonly SEC_HEADER_FLAG_MASK = 0x0800;
  private static readonly SEC_HEADER_FLAG_SHIFT = 11;
  private static readonly APID_MASK = 0x07ff;

  // Word 1
  private static readonly SEQ_FLAGS_MASK = 0xc000;
  private static readonly SEQ_FLAGS_SHIFT = 14;
  private static readonly SEQ_COUNTER_MASK = 0x3fff;

  /**
   * Decode the first 6 bytes of a buffer into a primary header
   * @param buffer At least 6 bytes, starting at the primary header
   * @returns Decoded header fields
   * @throws TruncatedFrameError if fewer than 6 bytes are given
   * @throws MalformedHeaderError if an enumerated field holds an undefined code
   */
  static decode(buffer: Buffer): PrimaryHeader {
    if (buffer.length < PRIMARY_HEADER_SIZE) {
      throw new TruncatedFrameError("header", PRIMARY_HEADER_SIZE, buffer.length);
    }

    const identification = buffer.readUInt16BE(0);
    const sequenceControl = buffer.readUInt16BE(2);
    const dataLength = buffer.readUInt16BE(DATA_LENGTH_OFFSET);

    const typeCode =
      (identification & this.TYPE_MASK) >> this.TYPE_SHIFT;
    const packetType = toPacketType(typeCode);
    if (packetType === null) {
      throw new MalformedHeaderError("packetType", typeCode);
    }

    const flagsCode =
      (sequenceControl & this.SEQ_FLAGS_MASK) >> this.SEQ_FLAGS_SHIFT;
    const sequenceFlags = toSequenceFlags(flagsCode);
    if (sequenceFlags === null) {
      throw new MalformedHeaderError("sequenceFlags", flagsCode);
    }

    return {
      versionNumber:
        (identification & this.VERSION_MASK) >> this.VERSION_SHIFT,
      packetType,
      secondaryHeaderFlag:
        (identification & this.SEC_HEADER_FLAG_MASK) >> this.SEC_HEADER_FLAG_SHIFT !== 0,
      apid: identification & this.APID_MASK,
      sequenceFlags,
      sequenceCounter: sequenceControl & this.SEQ_COUNTER_MASK,
      dataLength,
    };
  }

  /**
   * Encode a primary header into its 6-byte wire form
   * @param header Header fields, each within its bit width
   * @returns 6 bytes of primary header data
   * @throws InvalidFieldError if a field does not fit its bit width
   */
  static encode(header: PrimaryHeader): Buffer {
    this.checkRange("versionNumber", header.versionNumber, 0x7);
    this.checkRange("packetType", header.packetType, 0x1);
    this.checkRange("apid", header.apid, this.APID_MASK);
    this.checkRange("sequenceFlags", header.sequenceFlags, 0x3);
    this.checkRange("sequenceCounter", header.sequenceCounter, this.SEQ_COUNTER_MASK);
    this.checkRange("dataLength", header.dataLength, 0xffff);

    const buffer = Buffer.alloc(PRIMARY_HEADER_SIZE);

    // First 2 bytes
    let word = header.versionNumber << this.VERSION_SHIFT;
    word |= header.packetType << this.TYPE_SHIFT;
    word |= (header.secondaryHeaderFlag ? 1 : 0) << this.SEC_HEADER_FLAG_SHIFT;
    word |= header.apid;
    buffer.writeUInt16BE(word, 0);

    // Next 2 bytes
    word = header.sequenceFlags << this.SEQ_FLAGS_SHIFT;
    word |= header.sequenceCounter;
    buffer.writeUInt16BE(word, 2);

    // Final 2 bytes
    buffer.writeUInt16BE(header.dataLength, DATA_LENGTH_OFFSET);

    return buffer;
  }

  /**
   * Read only the data length field, without decoding the rest of the header
   * @param buffer At least 6 bytes of primary header
   * @returns Raw data length field (data field size - 1)
   */
  static readDataLength(buffer: Buffer): number {
    if (buffer.length < PRIMARY_HEADER_SIZE) {
      throw new TruncatedFrameError("header", PRIMARY_HEADER_SIZE, buffer.length);
    }
    return buffer.readUInt16BE(DATA_LENGTH_OFFSET);
  }

  /**
   * Size in bytes of the data field announced by a header
   */
  static dataFieldSize(header: PrimaryHeader): number {
    return header.dataLength + 1;
  }

  private static checkRange(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new InvalidFieldError(
        `Invalid ${field}: ${value} (expected an integer from 0 to ${max})`,
      );
    }
  }
}
