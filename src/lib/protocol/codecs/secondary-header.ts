import type { SecondaryHeader } from "../interfaces/secondary-header.ts";
import { SECONDARY_HEADER_SIZE } from "../constants.ts";
import { InvalidFieldError, TruncatedFrameError } from "../../utils/errors.ts";

/**
 * Secondary header codec
 *
 * ```
 * [0-3] time week (uint32 BE)
 * [4-7] time ms   (uint32 BE)
 * ```
 */
export class SecondaryHeaderCodec {
  /**
   * Decode the first 8 bytes of a buffer into a secondary header
   * @throws TruncatedFrameError if fewer than 8 bytes are given
   */
  static decode(buffer: Buffer): SecondaryHeader {
    if (buffer.length < SECONDARY_HEADER_SIZE) {
      throw new TruncatedFrameError("body", SECONDARY_HEADER_SIZE, buffer.length);
    }

    return {
      timeWeek: buffer.readUInt32BE(0),
      timeMs: buffer.readUInt32BE(4),
    };
  }

  /**
   * Encode a secondary header into its 8-byte wire form
   * @throws InvalidFieldError if a field is not an unsigned 32-bit integer
   */
  static encode(header: SecondaryHeader): Buffer {
    for (const [field, value] of [
      ["timeWeek", header.timeWeek],
      ["timeMs", header.timeMs],
    ] as const) {
      if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
        throw new InvalidFieldError(
          `Invalid ${field}: ${value} (expected an unsigned 32-bit integer)`,
        );
      }
    }

    const buffer = Buffer.alloc(SECONDARY_HEADER_SIZE);
    buffer.writeUInt32BE(header.timeWeek, 0);
    buffer.writeUInt32BE(header.timeMs, 4);
    return buffer;
  }
}
