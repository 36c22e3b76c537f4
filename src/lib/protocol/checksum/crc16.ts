import type { ChecksumAccumulator } from "../interfaces/checksum.ts";

/**
 * CRC-16-CCITT accumulator for frame error detection
 *
 * Polynomial: 0x1021 (x^16 + x^12 + x^5 + 1)
 * Initial value: 0xFFFF
 * Final XOR: 0x0000
 *
 * Known as CRC-16/CCITT-FALSE. With no reflection and no final XOR, running
 * the CRC over a frame followed by its own big-endian CRC leaves a zero
 * register, which is how received frames are validated.
 */
export class Crc16Accumulator implements ChecksumAccumulator {
  private static readonly POLYNOMIAL = 0x1021;
  private static readonly INITIAL_VALUE = 0xffff;
  private static readonly VALID_RESIDUE = 0x0000;

  public initial(): number {
    return Crc16Accumulator.INITIAL_VALUE;
  }

  /**
   * Continue a running CRC over more bytes
   * @param state CRC register after the previous bytes
   * @param bytes Next bytes of the frame
   * @returns Updated 16-bit CRC register
   */
  public accumulate(state: number, bytes: Uint8Array): number {
    let crc = state & 0xffff;

    for (const byte of bytes) {
      crc ^= byte << 8;

      for (let i = 0; i < 8; i++) {
        if (crc & 0x8000) {
          crc = (crc << 1) ^ Crc16Accumulator.POLYNOMIAL;
        } else {
          crc <<= 1;
        }
        crc &= 0xffff; // Keep 16-bit
      }
    }

    return crc;
  }

  public isValid(state: number): boolean {
    return state === Crc16Accumulator.VALID_RESIDUE;
  }

  public digest(state: number): number {
    return state & 0xffff;
  }

  public finalizeAndAppend(state: number, bytes: Uint8Array): Buffer {
    const crc = this.accumulate(state, bytes);
    const output = Buffer.alloc(bytes.length + 2);
    output.set(bytes, 0);
    output.writeUInt16BE(crc, bytes.length);
    return output;
  }

  /**
   * Calculate CRC-16-CCITT for given data
   * @param data Input data
   * @returns 16-bit CRC value
   */
  static calculate(data: Uint8Array): number {
    const accumulator = new Crc16Accumulator();
    return accumulator.accumulate(accumulator.initial(), data);
  }
}

/**
 * Shared default accumulator (stateless, safe to reuse)
 */
export const crc16Accumulator = new Crc16Accumulator();
