import { describe, it, expect } from "vitest";
import { PacketChannel } from "./packet-channel.ts";
import { ChannelClosedError } from "../utils/errors.ts";
import { flushPromises } from "../../__tests__/utils/test-helpers.ts";

interface Item {
  id: number;
}

const item = (id: number): Item => ({ id });

describe("PacketChannel", () => {
  it("should deliver values in FIFO order", async () => {
    const channel = new PacketChannel<Item>(4);
    await channel.send(item(1));
    await channel.send(item(2));
    await channel.send(item(3));

    expect(await channel.receive()).toEqual({ id: 1 });
    expect(await channel.receive()).toEqual({ id: 2 });
    expect(await channel.receive()).toEqual({ id: 3 });
  });

  it("should hand a value straight to a waiting receiver", async () => {
    const channel = new PacketChannel<Item>(1);
    const received = channel.receive();

    await channel.send(item(7));
    expect(await received).toEqual({ id: 7 });
    expect(channel.size).toBe(0);
  });

  it("should block senders while the queue is full", async () => {
    const channel = new PacketChannel<Item>(1);
    await channel.send(item(1));

    let delivered = false;
    const blocked = channel.send(item(2)).then(() => {
      delivered = true;
    });
    await flushPromises();
    expect(delivered).toBe(false);
    expect(channel.size).toBe(1);

    expect(await channel.receive()).toEqual({ id: 1 });
    await blocked;
    expect(delivered).toBe(true);
    expect(await channel.receive()).toEqual({ id: 2 });
  });

  it("should give each value to exactly one of several receivers", async () => {
    const channel = new PacketChannel<Item>(4);
    const first = channel.receive();
    const second = channel.receive();

    await channel.send(item(1));
    await channel.send(item(2));

    expect(await first).toEqual({ id: 1 });
    expect(await second).toEqual({ id: 2 });
  });

  it("should drain queued values after close, then report end-of-stream", async () => {
    const channel = new PacketChannel<Item>(4);
    await channel.send(item(1));
    channel.close();

    expect(channel.isClosed).toBe(true);
    expect(await channel.receive()).toEqual({ id: 1 });
    expect(await channel.receive()).toBeNull();
    expect(await channel.receive()).toBeNull();
  });

  it("should wake waiting receivers with null on close", async () => {
    const channel = new PacketChannel<Item>(4);
    const waiting = channel.receive();
    channel.close();
    expect(await waiting).toBeNull();
  });

  it("should reject blocked and later senders on close", async () => {
    const channel = new PacketChannel<Item>(1);
    await channel.send(item(1));
    const blocked = channel.send(item(2));

    channel.close();

    await expect(blocked).rejects.toThrow(ChannelClosedError);
    await expect(channel.send(item(3))).rejects.toThrow(ChannelClosedError);
    expect(await channel.receive()).toEqual({ id: 1 });
    expect(await channel.receive()).toBeNull();
  });

  it("should be async iterable until closed", async () => {
    const channel = new PacketChannel<Item>(4);
    await channel.send(item(1));
    await channel.send(item(2));
    channel.close();

    const ids: number[] = [];
    for await (const value of channel) {
      ids.push(value.id);
    }
    expect(ids).toEqual([1, 2]);
  });

  it("should reject a capacity below one", () => {
    expect(() => new PacketChannel<Item>(0)).toThrow(RangeError);
  });
});
