import { expect } from "vitest";
import type { ByteSource } from "../../lib/stream/byte-source.ts";
import { PacketType, SpacePacket } from "../../lib/protocol/index.ts";

/**
 * Convert hex string to Buffer, ignoring whitespace
 */
export function hexToBuffer(hex: string): Buffer {
  return Buffer.from(hex.replace(/\s+/g, ""), "hex");
}

/**
 * Assert that a buffer matches a hex string (whitespace ignored, case-insensitive)
 */
export function expectHex(buffer: Uint8Array, hex: string): void {
  expect(Buffer.from(buffer).toString("hex")).toBe(
    hex.replace(/\s+/g, "").toLowerCase(),
  );
}

/**
 * Telemetry frame with secondary header and 6 bytes of user data
 */
export const SP1 = {
  header: hexToBuffer("08 73 C1 23 00 0F"),
  body: hexToBuffer("00 00 12 34 00 AB CD EF A5 A5 5A 5A C3 3C C1 F8"),
} as const;

/**
 * Telecommand frame without secondary header and 3 bytes of user data
 */
export const SP2 = {
  header: hexToBuffer("17 54 C6 82 00 04"),
  body: hexToBuffer("01 02 00 2D DD"),
} as const;

export function frameOf(fixture: { header: Buffer; body: Buffer }): Buffer {
  return Buffer.concat([fixture.header, fixture.body]);
}

/**
 * Small telemetry packet on APID 42 whose single user data byte equals its
 * sequence counter
 */
export function numberedPacket(counter: number): SpacePacket {
  return SpacePacket.compose({
    packetType: PacketType.TELEMETRY,
    apid: 42,
    sequenceCounter: counter,
    userData: Buffer.from([counter & 0xff]),
  });
}

export function numberedStream(count: number): Buffer {
  const frames: Buffer[] = [];
  for (let i = 0; i < count; i++) {
    frames.push(numberedPacket(i).intoBuffer());
  }
  return Buffer.concat(frames);
}

/**
 * Deterministic pseudo-random generator (mulberry32)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Let pending promise callbacks run
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

interface PendingRead {
  size: number;
  resolve: (bytes: Buffer) => void;
  reject: (error: unknown) => void;
}

/**
 * Byte source whose reads stay pending until the test answers them
 */
export class ManualByteSource implements ByteSource {
  public readonly requests: PendingRead[] = [];

  public read(size: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      this.requests.push({ size, resolve, reject });
    });
  }

  /** Size asked for by the oldest unanswered read */
  get pendingSize(): number | null {
    return this.requests[0]?.size ?? null;
  }

  public respond(bytes: Uint8Array): void {
    const request = this.requests.shift();
    if (!request) throw new Error("No pending read");
    request.resolve(Buffer.from(bytes));
  }

  public fail(error: unknown): void {
    const request = this.requests.shift();
    if (!request) throw new Error("No pending read");
    request.reject(error);
  }
}
