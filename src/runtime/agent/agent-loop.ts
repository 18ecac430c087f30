import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import { logger } from "../../logger";
import { decode, DecodeError, encode, fitContent } from "../../protocol/codec";
import { composeEnvelope, MessageKind, type MessageEnvelope } from "../../protocol/envelope";
import { MAX_DATAGRAM_BYTES, type DatagramTransport } from "../../transport/types";
import { buildPrompt } from "../backends/prompt";
import type { PromptContext } from "../backends/types";
import { describeError, GatewayAbortedError } from "../gateway/errors";
import type { ConversationMemory } from "../memory/conversation-memory";
import type { PeerRegistry } from "../registry/peer-registry";
import type { SpeakingPolicy } from "../turns/speaking-policy";
import { TurnScheduler, type TurnTicket } from "../turns/turn-scheduler";
import { BoundedChannel } from "./bounded-channel";

export type AgentIdentity = {
  id: string;
  personality: string;
  role?: string;
  model: string;
};

export type FailureMode = "skip" | "notice";

export interface TextGenerator {
  generate(prompt: PromptContext, signal?: AbortSignal): Promise<string>;
}

export interface VoiceSink {
  /** Fire and forget; implementations log their own failures. */
  speak(text: string): void;
}

export type AgentTiming = {
  quietMs: number;
  cooldownMs: number;
  processingDelayMs: number;
  /** 0 disables heartbeats. */
  heartbeatIntervalMs: number;
  peerPruneIntervalMs?: number;
};

export type SwarmAgentOptions = {
  identity: AgentIdentity;
  transport: DatagramTransport;
  generator: TextGenerator;
  registry: PeerRegistry;
  memory: ConversationMemory;
  policy: SpeakingPolicy;
  timing: AgentTiming;
  onFailure?: FailureMode;
  failureNotice?: string;
  /** Opening message in free-form mode; empty disables it. */
  greeting?: string;
  voice?: VoiceSink;
  channelCapacity?: number;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export const DEFAULT_FAILURE_NOTICE = "I'm having trouble thinking right now, please go on without me.";
export const DEFAULT_GREETING = "Hi";

const defaultSleep = async (ms: number, signal: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

/**
 * One swarm participant. The receiver runs inside the transport callback and
 * never waits on generation; the responder drains compose tickets one at a
 * time from a bounded channel.
 */
export class SwarmAgent {
  readonly scheduler: TurnScheduler;
  private readonly channel: BoundedChannel<TurnTicket>;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly log: Logger;
  private tasks: Promise<void>[] = [];
  private timers: ReturnType<typeof setInterval>[] = [];
  private currentTurn: AbortController | null = null;
  private started = false;
  private stopped = false;

  constructor(private readonly options: SwarmAgentOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.channel = new BoundedChannel<TurnTicket>(options.channelCapacity ?? 1);
    this.log = logger.child({ agentId: options.identity.id });
    this.scheduler = new TurnScheduler({
      quietMs: options.timing.quietMs,
      cooldownMs: options.timing.cooldownMs,
      policy: options.policy,
      highestTurnSequence: () => options.memory.highestTurnSequence(),
      onCompose: (ticket) => this.enqueue(ticket),
    });
  }

  get id(): string {
    return this.options.identity.id;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error(`Agent ${this.id} already started`);
    }
    this.started = true;

    await this.options.transport.join();
    this.tasks.push(this.options.transport.receiveLoop((bytes) => this.handleDatagram(bytes)));
    this.tasks.push(this.runResponder());
    this.startTimers();

    this.log.info(
      {
        mode: this.options.policy.mode,
        role: this.options.identity.role,
        model: this.options.identity.model,
      },
      "Agent joined the swarm",
    );

    if (this.options.policy.mode === "debate") {
      this.scheduler.kickoff();
      return;
    }
    const greeting = this.options.greeting ?? DEFAULT_GREETING;
    if (greeting) {
      await this.broadcast(greeting, undefined);
    }
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.scheduler.stop();
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.currentTurn?.abort();
    this.channel.close();
    await this.options.transport.close();
    await Promise.all(this.tasks);
    this.log.info("Agent left the swarm");
  }

  /** Receiver: runs synchronously for each datagram. */
  handleDatagram(bytes: Uint8Array): void {
    if (this.stopped) {
      return;
    }

    let envelope: MessageEnvelope;
    try {
      envelope = decode(bytes);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.log.debug({ error: error.message, size: bytes.length }, "Dropped malformed datagram");
        return;
      }
      throw error;
    }

    const verdict = this.options.registry.admit(envelope, this.now());
    if (verdict !== "accepted") {
      this.log.debug({ messageId: envelope.messageId, verdict }, "Ignored datagram");
      return;
    }
    if (envelope.kind === MessageKind.HEARTBEAT) {
      return;
    }

    this.options.memory.append({
      role: "peer",
      peerId: envelope.senderId,
      content: envelope.content,
      timestamp: envelope.createdAt,
      turnSequence: envelope.turnSequence,
    });
    this.log.info(
      { peerId: envelope.senderId, turnSequence: envelope.turnSequence },
      `${envelope.senderId}: ${envelope.content}`,
    );
    this.scheduler.observe();
  }

  private enqueue(ticket: TurnTicket): void {
    if (!this.channel.trySend(ticket)) {
      this.log.warn({ ticket: ticket.id }, "Responder is busy; dropping compose request");
      this.scheduler.failTurn(ticket);
    }
  }

  private async runResponder(): Promise<void> {
    for await (const ticket of this.channel) {
      if (this.stopped) {
        return;
      }
      try {
        await this.respond(ticket);
      } catch (error) {
        this.log.error({ error: describeError(error), ticket: ticket.id }, "Turn failed");
        this.scheduler.failTurn(ticket);
      }
    }
  }

  private async respond(ticket: TurnTicket): Promise<void> {
    const controller = new AbortController();
    this.currentTurn = controller;
    try {
      const { processingDelayMs } = this.options.timing;
      if (processingDelayMs > 0) {
        try {
          await this.sleep(processingDelayMs, controller.signal);
        } catch (error) {
          if (controller.signal.aborted) {
            return;
          }
          throw error;
        }
      }

      const prompt = buildPrompt(this.options.memory.snapshot());
      let reply: string;
      try {
        reply = await this.options.generator.generate(prompt, controller.signal);
      } catch (error) {
        if (this.stopped || error instanceof GatewayAbortedError) {
          return;
        }
        this.log.error({ error: describeError(error), ticket: ticket.id }, "Reply generation failed");
        await this.handleFailure(ticket);
        return;
      }

      if (this.stopped || !this.scheduler.beginBroadcast(ticket)) {
        return;
      }
      await this.broadcast(reply, ticket.turnSequence);
      this.scheduler.finishBroadcast(ticket);
    } finally {
      this.currentTurn = null;
    }
  }

  private async handleFailure(ticket: TurnTicket): Promise<void> {
    if (this.options.onFailure !== "notice") {
      this.scheduler.failTurn(ticket);
      return;
    }
    if (!this.scheduler.beginBroadcast(ticket)) {
      return;
    }
    await this.broadcast(this.options.failureNotice ?? DEFAULT_FAILURE_NOTICE, ticket.turnSequence);
    this.scheduler.finishBroadcast(ticket);
  }

  private async broadcast(text: string, turnSequence: number | undefined): Promise<void> {
    if (this.stopped) {
      return;
    }
    const envelope = fitContent(
      composeEnvelope({
        senderId: this.id,
        kind: turnSequence === undefined ? MessageKind.CHAT : MessageKind.DEBATE_TURN,
        content: text,
        turnSequence,
        now: this.now(),
      }),
      MAX_DATAGRAM_BYTES,
    );

    this.options.registry.remember(envelope.messageId);
    this.options.memory.append({
      role: "self",
      content: envelope.content,
      timestamp: envelope.createdAt,
      turnSequence: envelope.turnSequence,
    });
    this.log.info({ turnSequence }, `${this.id}: ${envelope.content}`);

    try {
      await this.options.transport.send(encode(envelope));
    } catch (error) {
      this.log.error({ error: describeError(error), messageId: envelope.messageId }, "Send failed");
      return;
    }
    this.options.voice?.speak(envelope.content);
  }

  private async sendHeartbeat(): Promise<void> {
    if (this.stopped) {
      return;
    }
    const envelope = composeEnvelope({
      senderId: this.id,
      kind: MessageKind.HEARTBEAT,
      content: "",
      now: this.now(),
    });
    this.options.registry.remember(envelope.messageId);
    try {
      await this.options.transport.send(encode(envelope));
    } catch (error) {
      this.log.warn({ error: describeError(error) }, "Heartbeat send failed");
    }
  }

  private startTimers(): void {
    const { heartbeatIntervalMs, peerPruneIntervalMs } = this.options.timing;
    if (heartbeatIntervalMs > 0) {
      this.timers.push(
        setInterval(() => {
          void this.sendHeartbeat();
        }, heartbeatIntervalMs),
      );
    }

    const pruneEvery = peerPruneIntervalMs ?? heartbeatIntervalMs;
    if (pruneEvery > 0) {
      this.timers.push(
        setInterval(() => {
          const removed = this.options.registry.prune(this.now());
          if (removed.length > 0) {
            this.log.info({ peers: removed }, "Peers went silent");
          }
        }, pruneEvery),
      );
    }
  }
}
