import type {
  ChecksumAccumulator,
  DataFieldKind,
  DataFieldLayout,
  PacketBuffers,
  PacketFields,
  PrimaryHeader,
  SecondaryHeader,
  UserDataField,
} from "./interfaces/index.ts";
import {
  CHECKSUM_SIZE,
  DATA_MAX_SIZE,
  PRIMARY_HEADER_SIZE,
  SECONDARY_HEADER_SIZE,
} from "./constants.ts";
import { SequenceFlags } from "./packet-types.ts";
import { crc16Accumulator } from "./checksum/crc16.ts";
import {
  PrimaryHeaderCodec,
  SecondaryHeaderCodec,
  UserDataFieldCodec,
} from "./codecs/index.ts";
import {
  ChecksumMismatchError,
  FramingError,
  InvalidFieldError,
  TruncatedFrameError,
} from "../utils/errors.ts";

/**
 * A complete space packet
 *
 * ## Wire format
 *
 * ```
 * [6]       primary header
 * [0 | 8]   secondary header (iff secondaryHeaderFlag)
 * [0..n]    user data
 * [2]       checksum (big-endian)
 * ```
 *
 * The data field (everything after the primary header) is exactly
 * `dataLength + 1` bytes.
 *
 * Packets are immutable. They are either decoded off the wire with
 * `fromBuffers` (checksum validated) or composed in memory with `create` /
 * `compose` (checksum computed).
 */
export class SpacePacket {
  public readonly primaryHeader: PrimaryHeader;
  public readonly secondaryHeader: SecondaryHeader | null;
  public readonly userData: UserDataField | null;
  public readonly checksum: number;

  private constructor(
    primaryHeader: PrimaryHeader,
    secondaryHeader: SecondaryHeader | null,
    userData: UserDataField | null,
    checksum: number,
  ) {
    this.primaryHeader = Object.freeze(primaryHeader);
    this.secondaryHeader = secondaryHeader && Object.freeze(secondaryHeader);
    this.userData = userData && Object.freeze(userData);
    this.checksum = checksum;
    Object.freeze(this);
  }

  /**
   * Decode a frame received as a primary header and a data field
   *
   * @param headerBuffer The 6-byte primary header
   * @param dataBuffer The data field, checksum included
   * @param accumulator Checksum used to validate the frame
   * @returns Decoded packet
   * @throws TruncatedFrameError if either buffer is shorter than the header requires
   * @throws FramingError if the data field is longer than announced, or the
   *   announced length cannot hold the checksum and secondary header
   * @throws MalformedHeaderError if the primary header holds an undefined code
   * @throws ChecksumMismatchError if the frame does not validate
   */
  static fromBuffers(
    headerBuffer: Buffer,
    dataBuffer: Buffer,
    accumulator: ChecksumAccumulator = crc16Accumulator,
  ): SpacePacket {
    if (headerBuffer.length < PRIMARY_HEADER_SIZE) {
      throw new TruncatedFrameError(
        "header",
        PRIMARY_HEADER_SIZE,
        headerBuffer.length,
      );
    }
    if (headerBuffer.length > PRIMARY_HEADER_SIZE) {
      throw new FramingError(
        `Primary header must be ${PRIMARY_HEADER_SIZE} bytes, got ${headerBuffer.length}`,
      );
    }

    const primaryHeader = PrimaryHeaderCodec.decode(headerBuffer);
    const hasSecondaryHeader = primaryHeader.secondaryHeaderFlag;

    const expectedSize = PrimaryHeaderCodec.dataFieldSize(primaryHeader);
    if (dataBuffer.length < expectedSize) {
      throw new TruncatedFrameError("body", expectedSize, dataBuffer.length);
    }
    if (dataBuffer.length > expectedSize) {
      throw new FramingError(
        `Data field is ${dataBuffer.length} bytes but the header announces ${expectedSize}`,
      );
    }

    // The header may announce less than the mandatory parts need
    const minimumSize =
      CHECKSUM_SIZE + (hasSecondaryHeader ? SECONDARY_HEADER_SIZE : 0);
    if (dataBuffer.length < minimumSize) {
      throw new FramingError(
        `Header announces a ${dataBuffer.length}-byte data field, at least ${minimumSize} required`,
      );
    }

    const checksum = dataBuffer.readUInt16BE(dataBuffer.length - CHECKSUM_SIZE);

    // Header, then the whole data field including the checksum bytes
    let state = accumulator.accumulate(accumulator.initial(), headerBuffer);
    state = accumulator.accumulate(state, dataBuffer);
    if (!accumulator.isValid(state)) {
      throw new ChecksumMismatchError(checksum);
    }

    const layout = SpacePacket.sliceDataField(hasSecondaryHeader, dataBuffer);

    return new SpacePacket(
      primaryHeader,
      "secondaryHeader" in layout ? layout.secondaryHeader : null,
      "userData" in layout ? layout.userData : null,
      checksum,
    );
  }

  /**
   * Build a packet from already-decoded components
   *
   * The checksum is computed over the encoded header, secondary header and
   * user data. Empty user data is treated as absent. Components are copied,
   * so later changes to the caller's objects do not reach the packet.
   *
   * @throws InvalidFieldError if the header disagrees with the components
   */
  static create(
    primaryHeader: PrimaryHeader,
    secondaryHeader: SecondaryHeader | null,
    userData: UserDataField | null,
    accumulator: ChecksumAccumulator = crc16Accumulator,
  ): SpacePacket {
    const effectiveUserData =
      userData !== null && userData.data.length > 0
        ? UserDataFieldCodec.decode(userData.data)
        : null;

    if (primaryHeader.secondaryHeaderFlag !== (secondaryHeader !== null)) {
      throw new InvalidFieldError(
        primaryHeader.secondaryHeaderFlag
          ? "Secondary header flag is set but no secondary header was given"
          : "Secondary header given but the secondary header flag is not set",
      );
    }

    const size = SpacePacket.dataFieldSizeFor(
      secondaryHeader !== null,
      effectiveUserData?.data.length ?? 0,
    );
    if (primaryHeader.dataLength !== size - 1) {
      throw new InvalidFieldError(
        `Data length ${primaryHeader.dataLength} does not match a ${size}-byte data field (expected ${size - 1})`,
      );
    }

    let state = accumulator.accumulate(
      accumulator.initial(),
      PrimaryHeaderCodec.encode(primaryHeader),
    );
    if (secondaryHeader) {
      state = accumulator.accumulate(
        state,
        SecondaryHeaderCodec.encode(secondaryHeader),
      );
    }
    if (effectiveUserData) {
      state = accumulator.accumulate(state, effectiveUserData.data);
    }

    return new SpacePacket(
      { ...primaryHeader },
      secondaryHeader && { ...secondaryHeader },
      effectiveUserData,
      accumulator.digest(state),
    );
  }

  /**
   * Build a packet from loose field values
   *
   * The secondary header flag and data length are derived from the
   * components, so the result always frames correctly.
   *
   * @throws InvalidFieldError if a field is out of range or the data field is too large
   */
  static compose(
    fields: PacketFields,
    accumulator: ChecksumAccumulator = crc16Accumulator,
  ): SpacePacket {
    const secondaryHeader = fields.secondaryHeader ?? null;
    const userData =
      fields.userData && fields.userData.length > 0
        ? UserDataFieldCodec.decode(fields.userData)
        : null;

    const size = SpacePacket.dataFieldSizeFor(
      secondaryHeader !== null,
      userData?.data.length ?? 0,
    );
    if (size > DATA_MAX_SIZE) {
      throw new InvalidFieldError(
        `Data field too large: ${size} bytes (max ${DATA_MAX_SIZE})`,
      );
    }

    return SpacePacket.create(
      {
        versionNumber: fields.versionNumber ?? 0,
        packetType: fields.packetType,
        secondaryHeaderFlag: secondaryHeader !== null,
        apid: fields.apid,
        sequenceFlags: fields.sequenceFlags ?? SequenceFlags.UNSEGMENTED,
        sequenceCounter: fields.sequenceCounter,
        dataLength: size - 1,
      },
      secondaryHeader,
      userData,
      accumulator,
    );
  }

  /**
   * Which optional parts a data field of the given size carries
   *
   * @param hasSecondaryHeader Secondary header flag from the primary header
   * @param dataFieldSize Size of the data field, checksum included
   */
  static classifyDataField(
    hasSecondaryHeader: boolean,
    dataFieldSize: number,
  ): DataFieldKind {
    const userDataSize =
      dataFieldSize -
      CHECKSUM_SIZE -
      (hasSecondaryHeader ? SECONDARY_HEADER_SIZE : 0);
    const hasUserData = userDataSize > 0;

    if (hasSecondaryHeader) {
      return hasUserData ? "secondary-and-user-data" : "secondary-only";
    }
    return hasUserData ? "user-data-only" : "checksum-only";
  }

  /**
   * Size of the data field holding the given parts plus the checksum
   */
  static dataFieldSizeFor(
    hasSecondaryHeader: boolean,
    userDataSize: number,
  ): number {
    return (
      (hasSecondaryHeader ? SECONDARY_HEADER_SIZE : 0) +
      userDataSize +
      CHECKSUM_SIZE
    );
  }

  private static sliceDataField(
    hasSecondaryHeader: boolean,
    data: Buffer,
  ): DataFieldLayout {
    const end = data.length - CHECKSUM_SIZE;
    const kind = SpacePacket.classifyDataField(hasSecondaryHeader, data.length);

    switch (kind) {
      case "secondary-and-user-data":
        return {
          kind,
          secondaryHeader: SecondaryHeaderCodec.decode(
            data.subarray(0, SECONDARY_HEADER_SIZE),
          ),
          userData: UserDataFieldCodec.decode(
            data.subarray(SECONDARY_HEADER_SIZE, end),
          ),
        };
      case "secondary-only":
        return {
          kind,
          secondaryHeader: SecondaryHeaderCodec.decode(
            data.subarray(0, SECONDARY_HEADER_SIZE),
          ),
        };
      case "user-data-only":
        return { kind, userData: UserDataFieldCodec.decode(data.subarray(0, end)) };
      case "checksum-only":
        return { kind };
    }
  }

  /**
   * Data field content of this packet as a tagged variant
   */
  get layout(): DataFieldLayout {
    if (this.secondaryHeader && this.userData) {
      return {
        kind: "secondary-and-user-data",
        secondaryHeader: this.secondaryHeader,
        userData: this.userData,
      };
    }
    if (this.secondaryHeader) {
      return { kind: "secondary-only", secondaryHeader: this.secondaryHeader };
    }
    if (this.userData) {
      return { kind: "user-data-only", userData: this.userData };
    }
    return { kind: "checksum-only" };
  }

  /**
   * Total frame size in bytes (primary header + data field)
   */
  get frameSize(): number {
    return PRIMARY_HEADER_SIZE + PrimaryHeaderCodec.dataFieldSize(this.primaryHeader);
  }

  /**
   * Serialize the packet as one frame with a freshly computed checksum
   */
  public intoBuffer(accumulator: ChecksumAccumulator = crc16Accumulator): Buffer {
    const frame = Buffer.concat([
      PrimaryHeaderCodec.encode(this.primaryHeader),
      ...this.dataFieldParts(),
    ]);
    return accumulator.finalizeAndAppend(accumulator.initial(), frame);
  }

  /**
   * Serialize the packet split the way the reader receives it
   *
   * The checksum is accumulated over the header first, then continued over
   * the data field; the result matches `intoBuffer` byte for byte.
   */
  public intoBuffers(
    accumulator: ChecksumAccumulator = crc16Accumulator,
  ): PacketBuffers {
    const header = PrimaryHeaderCodec.encode(this.primaryHeader);
    const state = accumulator.accumulate(accumulator.initial(), header);
    const body = accumulator.finalizeAndAppend(
      state,
      Buffer.concat(this.dataFieldParts()),
    );
    return { header, body };
  }

  private dataFieldParts(): Buffer[] {
    const parts: Buffer[] = [];
    if (this.secondaryHeader) {
      parts.push(SecondaryHeaderCodec.encode(this.secondaryHeader));
    }
    if (this.userData) {
      parts.push(UserDataFieldCodec.encode(this.userData));
    }
    return parts;
  }
}
