import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { BufferByteSource, StreamByteSource } from "./byte-source.ts";
import { SourceReadError } from "../utils/errors.ts";
import { expectHex, hexToBuffer } from "../../__tests__/utils/test-helpers.ts";

describe("StreamByteSource", () => {
  it("should assemble reads across chunk boundaries", async () => {
    const source = new StreamByteSource(
      Readable.from([hexToBuffer("01 02"), hexToBuffer("03"), hexToBuffer("04 05 06 07")]),
    );

    expectHex(await source.read(3), "010203");
    expectHex(await source.read(2), "0405");
    expectHex(await source.read(2), "0607");
  });

  it("should return fewer bytes only at end of stream", async () => {
    const source = new StreamByteSource(Readable.from([hexToBuffer("AA BB CC")]));

    expectHex(await source.read(2), "AABB");
    expectHex(await source.read(6), "CC");
    expect((await source.read(6)).length).toBe(0);
  });

  it("should return an empty buffer for an empty stream", async () => {
    const source = new StreamByteSource(Readable.from([]));
    expect((await source.read(6)).length).toBe(0);
  });

  it("should accept string chunks", async () => {
    const source = new StreamByteSource(Readable.from(["AB"]));
    expectHex(await source.read(2), "4142");
  });

  it("should wrap stream errors in SourceReadError", async () => {
    const cause = new Error("EIO");
    const stream = new Readable({
      read() {
        this.destroy(cause);
      },
    });
    const source = new StreamByteSource(stream);

    const error = await source.read(6).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SourceReadError);
    if (error instanceof SourceReadError) {
      expect(error.message).toBe("Failed to read from source: EIO");
      expect(error.cause).toBe(cause);
    }
  });

  it("should reject a negative read size", async () => {
    const source = new StreamByteSource(Readable.from([]));
    await expect(source.read(-1)).rejects.toThrow(RangeError);
  });
});

describe("BufferByteSource", () => {
  it("should serve exact reads until the data runs out", async () => {
    const source = new BufferByteSource(hexToBuffer("01 02 03 04 05"));

    expectHex(await source.read(2), "0102");
    expect(source.remaining).toBe(3);
    expectHex(await source.read(4), "030405");
    expect((await source.read(1)).length).toBe(0);
  });

  it("should not alias the input", async () => {
    const data = hexToBuffer("01 02");
    const source = new BufferByteSource(data);
    data[0] = 0xff;
    expectHex(await source.read(2), "0102");
  });
});
