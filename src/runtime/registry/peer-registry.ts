import type { MessageEnvelope } from "../../protocol/envelope";
import { SeenIdSet } from "./seen-ids";

const DEFAULT_PEER_TTL_MS = 60_000;

export type PeerRecord = {
  agentId: string;
  lastSeen: number;
};

export type AdmitResult = "accepted" | "duplicate" | "self";

export type PeerRegistryOptions = {
  selfId: string;
  seenCapacity?: number;
  peerTtlMs?: number;
};

/**
 * Tracks known senders and recently processed message ids. The single point
 * where retransmits and the agent's own echo are suppressed.
 */
export class PeerRegistry {
  private readonly peerMap = new Map<string, PeerRecord>();
  private readonly seen: SeenIdSet;
  private readonly peerTtlMs: number;

  constructor(private readonly options: PeerRegistryOptions) {
    this.seen = new SeenIdSet(options.seenCapacity);
    this.peerTtlMs = options.peerTtlMs ?? DEFAULT_PEER_TTL_MS;
  }

  admit(envelope: MessageEnvelope, now: number = Date.now()): AdmitResult {
    const fromSelf = envelope.senderId === this.options.selfId;
    if (!fromSelf) {
      // Retransmits refresh lastSeen as well.
      this.peerMap.set(envelope.senderId, { agentId: envelope.senderId, lastSeen: now });
    }
    if (!this.seen.add(envelope.messageId)) {
      return "duplicate";
    }
    return fromSelf ? "self" : "accepted";
  }

  /** Registers an id composed locally so its network echo is treated as a duplicate. */
  remember(messageId: string): void {
    this.seen.add(messageId);
  }

  hasSeen(messageId: string): boolean {
    return this.seen.has(messageId);
  }

  /** Drops peers silent for longer than the TTL and returns their ids. */
  prune(now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [agentId, record] of this.peerMap) {
      if (now - record.lastSeen > this.peerTtlMs) {
        this.peerMap.delete(agentId);
        removed.push(agentId);
      }
    }
    return removed;
  }

  peers(): PeerRecord[] {
    return Array.from(this.peerMap.values(), (record) => ({ ...record }));
  }
}
