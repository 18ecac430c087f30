export type SystemEntry = {
  role: "system";
  content: string;
  timestamp: number;
};

export type SelfEntry = {
  role: "self";
  content: string;
  timestamp: number;
  turnSequence?: number;
};

export type PeerEntry = {
  role: "peer";
  peerId: string;
  content: string;
  timestamp: number;
  turnSequence?: number;
};

export type ConversationEntry = SystemEntry | SelfEntry | PeerEntry;
export type AppendableEntry = SelfEntry | PeerEntry;

export type ConversationMemoryOptions = {
  systemPrompt: string;
  maxEntries?: number;
  maxContentChars?: number;
  now?: () => number;
};

const DEFAULT_MAX_ENTRIES = 50;
const DEFAULT_MAX_CONTENT_CHARS = 16_000;

/**
 * Sliding window of the conversation as seen by one agent. Entry 0 is the
 * pinned system prompt; everything after it is evicted oldest first whenever
 * the entry count or the total content length goes over budget.
 */
export class ConversationMemory {
  readonly maxEntries: number;
  readonly maxContentChars: number;
  private readonly entries: ConversationEntry[];
  private totalChars: number;
  private highestSequence = 0;

  constructor(options: ConversationMemoryOptions) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.maxContentChars = options.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
    if (options.systemPrompt.length >= this.maxContentChars) {
      throw new RangeError(
        `system prompt (${options.systemPrompt.length} chars) leaves no room within maxContentChars (${this.maxContentChars})`,
      );
    }
    const pinned: SystemEntry = {
      role: "system",
      content: options.systemPrompt,
      timestamp: (options.now ?? Date.now)(),
    };
    this.entries = [pinned];
    this.totalChars = pinned.content.length;
  }

  append(entry: AppendableEntry): void {
    const room = Math.max(0, this.maxContentChars - this.entries[0].content.length);
    const stored: AppendableEntry =
      entry.content.length > room ? { ...entry, content: entry.content.slice(0, room) } : { ...entry };

    this.entries.push(stored);
    this.totalChars += stored.content.length;
    if (stored.turnSequence !== undefined && stored.turnSequence > this.highestSequence) {
      this.highestSequence = stored.turnSequence;
    }
    this.evict();
  }

  snapshot(): readonly ConversationEntry[] {
    return Object.freeze(this.entries.map((entry) => Object.freeze({ ...entry })));
  }

  /** Highest turn sequence ever appended, 0 when none. Unaffected by eviction. */
  highestTurnSequence(): number {
    return this.highestSequence;
  }

  get size(): number {
    return this.entries.length;
  }

  get contentChars(): number {
    return this.totalChars;
  }

  private evict(): void {
    while (
      this.entries.length > 1 &&
      (this.entries.length > this.maxEntries || this.totalChars > this.maxContentChars)
    ) {
      const [removed] = this.entries.splice(1, 1);
      this.totalChars -= removed.content.length;
    }
  }
}
