import { logger } from "../../logger";
import type { SpeakingPolicy } from "./speaking-policy";

export const TurnState = {
  IDLE: "idle",
  LISTENING: "listening",
  COMPOSING: "composing",
  BROADCASTING: "broadcasting",
  COOLDOWN: "cooldown",
} as const;

export type TurnStateValue = (typeof TurnState)[keyof typeof TurnState];

export type TurnTicket = {
  id: number;
  /** Sequence to tag the reply with, in debate mode. */
  turnSequence?: number;
};

export type TurnSchedulerOptions = {
  quietMs: number;
  cooldownMs: number;
  policy: SpeakingPolicy;
  highestTurnSequence: () => number;
  /** Called synchronously on entering `composing`. */
  onCompose: (ticket: TurnTicket) => void;
};

/**
 * Decides when this agent may speak.
 *
 * idle/listening --observe--> listening (quiet timer restarted)
 * listening --quiet expiry + policy--> composing
 * composing --beginBroadcast--> broadcasting --finishBroadcast--> cooldown
 * composing --failTurn--> cooldown
 * cooldown --expiry--> listening if anything arrived during the turn or a debate
 *   slot is still ours, else idle
 */
export class TurnScheduler {
  private current: TurnStateValue = TurnState.IDLE;
  private quietTimer: ReturnType<typeof setTimeout> | null = null;
  private cooldownTimer: ReturnType<typeof setTimeout> | null = null;
  private activeTicket: TurnTicket | null = null;
  private activityDuringTurn = false;
  private nextTicketId = 1;
  private stopped = false;

  constructor(private readonly options: TurnSchedulerOptions) {}

  get state(): TurnStateValue {
    return this.current;
  }

  get inFlight(): TurnTicket | null {
    return this.activeTicket;
  }

  /** An accepted (non-duplicate, non-self) peer message arrived. */
  observe(): void {
    if (this.stopped) {
      return;
    }
    if (this.current === TurnState.IDLE || this.current === TurnState.LISTENING) {
      this.transition(TurnState.LISTENING);
      this.armQuietTimer();
      return;
    }
    this.activityDuringTurn = true;
  }

  /** Round start: listen without waiting for a first message. */
  kickoff(): void {
    if (this.stopped || this.current !== TurnState.IDLE) {
      return;
    }
    this.transition(TurnState.LISTENING);
    this.armQuietTimer();
  }

  beginBroadcast(ticket: TurnTicket): boolean {
    if (!this.owns(ticket, TurnState.COMPOSING, "beginBroadcast")) {
      return false;
    }
    this.transition(TurnState.BROADCASTING);
    return true;
  }

  finishBroadcast(ticket: TurnTicket): boolean {
    if (!this.owns(ticket, TurnState.BROADCASTING, "finishBroadcast")) {
      return false;
    }
    this.enterCooldown();
    return true;
  }

  failTurn(ticket: TurnTicket): boolean {
    if (!this.owns(ticket, TurnState.COMPOSING, "failTurn")) {
      return false;
    }
    this.enterCooldown();
    return true;
  }

  stop(): void {
    this.stopped = true;
    this.clearQuietTimer();
    if (this.cooldownTimer) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
    this.activeTicket = null;
  }

  private owns(ticket: TurnTicket, expected: TurnStateValue, action: string): boolean {
    if (this.stopped) {
      return false;
    }
    if (this.current !== expected || this.activeTicket?.id !== ticket.id) {
      logger.warn(
        { action, state: this.current, ticket: ticket.id, active: this.activeTicket?.id },
        "Ignored turn transition for a stale or foreign ticket",
      );
      return false;
    }
    return true;
  }

  private armQuietTimer(): void {
    this.clearQuietTimer();
    this.quietTimer = setTimeout(() => {
      this.quietTimer = null;
      this.onQuiet();
    }, this.options.quietMs);
  }

  private clearQuietTimer(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
      this.quietTimer = null;
    }
  }

  private onQuiet(): void {
    if (this.stopped || this.current !== TurnState.LISTENING || this.activeTicket) {
      return;
    }
    const decision = this.options.policy.decide({
      highestTurnSequence: this.options.highestTurnSequence(),
    });
    if (!decision.speak) {
      logger.debug({ reason: decision.reason }, "Quiet period elapsed; staying silent");
      return;
    }

    const ticket: TurnTicket = { id: this.nextTicketId++ };
    if (decision.turnSequence !== undefined) {
      ticket.turnSequence = decision.turnSequence;
    }
    this.activeTicket = ticket;
    this.activityDuringTurn = false;
    this.transition(TurnState.COMPOSING);
    this.options.onCompose(ticket);
  }

  private enterCooldown(): void {
    this.activeTicket = null;
    this.transition(TurnState.COOLDOWN);
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      this.onCooldownExpired();
    }, this.options.cooldownMs);
  }

  private onCooldownExpired(): void {
    if (this.stopped) {
      return;
    }
    if (this.activityDuringTurn || this.holdsNextDebateTurn()) {
      this.activityDuringTurn = false;
      this.transition(TurnState.LISTENING);
      this.armQuietTimer();
      return;
    }
    this.transition(TurnState.IDLE);
  }

  /** A skipped debate turn leaves the slot with us; nobody else will move the order on. */
  private holdsNextDebateTurn(): boolean {
    if (this.options.policy.mode !== "debate") {
      return false;
    }
    return this.options.policy.decide({
      highestTurnSequence: this.options.highestTurnSequence(),
    }).speak;
  }

  private transition(next: TurnStateValue): void {
    if (this.current === next) {
      return;
    }
    logger.debug({ from: this.current, to: next }, "Turn state changed");
    this.current = next;
  }
}
