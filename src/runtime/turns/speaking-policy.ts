export type SpeakDecision =
  | { speak: true; turnSequence?: number }
  | { speak: false; reason: "not-my-turn" | "debate-finished" | "gate-closed" };

export type SpeakContext = {
  /** Highest turn sequence observed in memory, 0 before the first turn. */
  highestTurnSequence: number;
};

export interface SpeakingPolicy {
  readonly mode: "free" | "debate";
  decide(context: SpeakContext): SpeakDecision;
}

export class AlwaysSpeakPolicy implements SpeakingPolicy {
  readonly mode = "free";

  decide(): SpeakDecision {
    return { speak: true };
  }
}

export class ProbabilisticSpeakPolicy implements SpeakingPolicy {
  readonly mode = "free";

  constructor(
    private readonly probability: number,
    private readonly random: () => number = Math.random,
  ) {
    if (!(probability >= 0 && probability <= 1)) {
      throw new RangeError(`speak probability must be within [0, 1], got ${probability}`);
    }
  }

  decide(): SpeakDecision {
    return this.random() < this.probability ? { speak: true } : { speak: false, reason: "gate-closed" };
  }
}

export type DebateSlot = {
  role: string;
  turnSequence: number;
};

export type DebatePolicyOptions = {
  /** Speaking order of one round, e.g. `["affirmative", "negative", "judge"]`. */
  roles: string[];
  role: string;
  /** Number of rounds; unbounded when omitted. */
  rounds?: number;
};

/**
 * Strict turn order for structured debates. Turn `s` (1-based) belongs to
 * `roles[(s - 1) % roles.length]`; an agent may speak only when the highest
 * sequence observed is exactly the one before its own slot. There is no
 * timeout override.
 */
export class DebateTurnPolicy implements SpeakingPolicy {
  readonly mode = "debate";
  private readonly roles: string[];

  constructor(private readonly options: DebatePolicyOptions) {
    if (options.roles.length === 0) {
      throw new RangeError("debate requires at least one role");
    }
    if (!options.roles.includes(options.role)) {
      throw new RangeError(`role '${options.role}' is not part of the debate order`);
    }
    this.roles = [...options.roles];
  }

  roleForTurn(turnSequence: number): string {
    return this.roles[(turnSequence - 1) % this.roles.length];
  }

  get totalTurns(): number | undefined {
    return this.options.rounds === undefined ? undefined : this.options.rounds * this.roles.length;
  }

  /** Slots this agent holds; empty when the debate is unbounded. */
  slots(): DebateSlot[] {
    const total = this.totalTurns ?? 0;
    const slots: DebateSlot[] = [];
    for (let turnSequence = 1; turnSequence <= total; turnSequence++) {
      const role = this.roleForTurn(turnSequence);
      if (role === this.options.role) {
        slots.push({ role, turnSequence });
      }
    }
    return slots;
  }

  decide(context: SpeakContext): SpeakDecision {
    const next = context.highestTurnSequence + 1;
    const total = this.totalTurns;
    if (total !== undefined && next > total) {
      return { speak: false, reason: "debate-finished" };
    }
    if (this.roleForTurn(next) !== this.options.role) {
      return { speak: false, reason: "not-my-turn" };
    }
    return { speak: true, turnSequence: next };
  }
}
