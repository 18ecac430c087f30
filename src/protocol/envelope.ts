import { randomUUID } from "node:crypto";

export const PROTOCOL_VERSION = 1;

export const MessageKind = {
  CHAT: "chat",
  DEBATE_TURN: "debate-turn",
  HEARTBEAT: "heartbeat",
} as const;

export type MessageKindValue = (typeof MessageKind)[keyof typeof MessageKind];

/**
 * One wire-level message exchanged between agents.
 *
 * `messageId` is the canonical lowercase text form of a 128-bit identifier
 * (UUID layout). It is minted once by {@link composeEnvelope} and never reused.
 */
export interface MessageEnvelope {
  version: number;
  messageId: string;
  senderId: string;
  kind: MessageKindValue;
  content: string;
  /** Epoch milliseconds. */
  createdAt: number;
  /** Ordinal of a structured debate turn. */
  turnSequence?: number;
}

export function composeEnvelope(params: {
  senderId: string;
  kind: MessageKindValue;
  content: string;
  turnSequence?: number;
  now?: number;
}): MessageEnvelope {
  const envelope: MessageEnvelope = {
    version: PROTOCOL_VERSION,
    messageId: randomUUID(),
    senderId: params.senderId,
    kind: params.kind,
    content: params.content,
    createdAt: params.now ?? Date.now(),
  };
  if (params.turnSequence !== undefined) {
    envelope.turnSequence = params.turnSequence;
  }
  return envelope;
}

export function envelopeAgeMs(envelope: MessageEnvelope, now: number = Date.now()): number {
  return Math.max(0, now - envelope.createdAt);
}
