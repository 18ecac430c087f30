import { describe, expect, it } from "vitest";
import { BoundedChannel } from "./bounded-channel";

describe("BoundedChannel", () => {
  it("rejects sends beyond capacity", () => {
    const channel = new BoundedChannel<number>(1);
    expect(channel.trySend(1)).toBe(true);
    expect(channel.trySend(2)).toBe(false);
    expect(channel.size).toBe(1);
  });

  it("hands items straight to a waiting consumer", async () => {
    const channel = new BoundedChannel<string>();
    const pending = channel.receive();
    expect(channel.trySend("ticket")).toBe(true);
    expect(channel.size).toBe(0);
    await expect(pending).resolves.toBe("ticket");
  });

  it("ends iteration on close", async () => {
    const channel = new BoundedChannel<number>(2);
    channel.trySend(1);
    const received: number[] = [];
    const consumer = (async () => {
      for await (const item of channel) {
        received.push(item);
      }
    })();

    await Promise.resolve();
    channel.trySend(2);
    await Promise.resolve();
    channel.close();
    await consumer;

    expect(received).toEqual([1, 2]);
    expect(channel.trySend(3)).toBe(false);
  });

  it("requires a positive capacity", () => {
    expect(() => new BoundedChannel(0)).toThrow(RangeError);
  });
});
