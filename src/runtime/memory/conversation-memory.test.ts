import { describe, expect, it } from "vitest";
import { ConversationMemory } from "./conversation-memory";

function peer(peerId: string, content: string, turnSequence?: number) {
  return { role: "peer" as const, peerId, content, timestamp: 1, turnSequence };
}

describe("ConversationMemory", () => {
  it("starts with the pinned system prompt", () => {
    const memory = new ConversationMemory({ systemPrompt: "Be brief.", now: () => 5 });
    expect(memory.snapshot()).toEqual([{ role: "system", content: "Be brief.", timestamp: 5 }]);
  });

  it("keeps the entry count bounded and the pinned entry first", () => {
    const memory = new ConversationMemory({ systemPrompt: "sys", maxEntries: 4 });
    for (let i = 0; i < 10; i++) {
      memory.append(peer("b2", `m${i}`));
      expect(memory.size).toBeLessThanOrEqual(4);
      expect(memory.snapshot()[0].role).toBe("system");
    }
    expect(memory.snapshot().map((entry) => entry.content)).toEqual(["sys", "m7", "m8", "m9"]);
  });

  it("evicts oldest entries to honour the character budget", () => {
    const memory = new ConversationMemory({
      systemPrompt: "sys",
      maxEntries: 50,
      maxContentChars: 13,
    });
    memory.append(peer("b2", "aaaa"));
    memory.append(peer("c3", "bbbb"));
    memory.append({ role: "self", content: "cccc", timestamp: 2 });

    expect(memory.snapshot().map((entry) => entry.content)).toEqual(["sys", "bbbb", "cccc"]);
    expect(memory.contentChars).toBe(11);
  });

  it("clips an oversized entry to the room left by the pinned prompt", () => {
    const memory = new ConversationMemory({ systemPrompt: "sys", maxContentChars: 10 });
    memory.append(peer("b2", "0123456789abc"));

    expect(memory.snapshot().map((entry) => entry.content)).toEqual(["sys", "0123456"]);
    expect(memory.contentChars).toBe(10);
  });

  it("refuses a system prompt that fills the character budget", () => {
    expect(() => new ConversationMemory({ systemPrompt: "x".repeat(200), maxContentChars: 100 })).toThrow(
      "system prompt (200 chars) leaves no room within maxContentChars (100)",
    );
    expect(() => new ConversationMemory({ systemPrompt: "x".repeat(100), maxContentChars: 100 })).toThrow(
      RangeError,
    );

    const memory = new ConversationMemory({ systemPrompt: "x".repeat(99), maxContentChars: 100 });
    memory.append(peer("b2", "hello"));
    expect(memory.snapshot().map((entry) => entry.content)).toEqual(["x".repeat(99), "h"]);
  });

  it("never evicts the pinned entry", () => {
    const memory = new ConversationMemory({ systemPrompt: "sys", maxEntries: 1 });
    memory.append(peer("b2", "hello"));
    expect(memory.snapshot()).toHaveLength(1);
    expect(memory.snapshot()[0].content).toBe("sys");
  });

  it("returns frozen snapshots", () => {
    const memory = new ConversationMemory({ systemPrompt: "sys" });
    memory.append(peer("b2", "hello"));
    const snapshot = memory.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[1])).toBe(true);
    memory.append(peer("b2", "again"));
    expect(snapshot).toHaveLength(2);
  });

  it("remembers the highest turn sequence across evictions", () => {
    const memory = new ConversationMemory({ systemPrompt: "sys", maxEntries: 2 });
    expect(memory.highestTurnSequence()).toBe(0);
    memory.append(peer("b2", "opening", 1));
    memory.append(peer("c3", "late retransmit", 3));
    memory.append(peer("d4", "reordered", 2));
    memory.append(peer("d4", "chatter"));

    expect(memory.highestTurnSequence()).toBe(3);
    expect(memory.snapshot().map((entry) => entry.content)).toEqual(["sys", "chatter"]);
  });
});
