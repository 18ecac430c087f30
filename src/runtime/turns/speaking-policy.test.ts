import { describe, expect, it } from "vitest";
import { AlwaysSpeakPolicy, DebateTurnPolicy, ProbabilisticSpeakPolicy } from "./speaking-policy";

const ROLES = ["affirmative", "negative", "judge"];

describe("free-form policies", () => {
  it("always speaks by default", () => {
    expect(new AlwaysSpeakPolicy().decide()).toEqual({ speak: true });
  });

  it("gates on the injected random source", () => {
    const samples = [0.1, 0.9];
    const policy = new ProbabilisticSpeakPolicy(0.5, () => samples.shift() ?? 0);
    expect(policy.decide()).toEqual({ speak: true });
    expect(policy.decide()).toEqual({ speak: false, reason: "gate-closed" });
  });

  it("rejects probabilities outside [0, 1]", () => {
    expect(() => new ProbabilisticSpeakPolicy(1.5)).toThrow(RangeError);
  });
});

describe("DebateTurnPolicy", () => {
  it("lets only the first role open the round", () => {
    const decisions = ROLES.map((role) =>
      new DebateTurnPolicy({ roles: ROLES, role }).decide({ highestTurnSequence: 0 }),
    );
    expect(decisions).toEqual([
      { speak: true, turnSequence: 1 },
      { speak: false, reason: "not-my-turn" },
      { speak: false, reason: "not-my-turn" },
    ]);
  });

  it("follows the turn sequence progression", () => {
    const negative = new DebateTurnPolicy({ roles: ROLES, role: "negative" });
    const judge = new DebateTurnPolicy({ roles: ROLES, role: "judge" });

    expect(negative.decide({ highestTurnSequence: 1 })).toEqual({ speak: true, turnSequence: 2 });
    expect(judge.decide({ highestTurnSequence: 1 })).toEqual({ speak: false, reason: "not-my-turn" });
    expect(judge.decide({ highestTurnSequence: 2 })).toEqual({ speak: true, turnSequence: 3 });
    expect(negative.decide({ highestTurnSequence: 4 })).toEqual({ speak: true, turnSequence: 5 });
  });

  it("stops after the configured rounds", () => {
    const affirmative = new DebateTurnPolicy({ roles: ROLES, role: "affirmative", rounds: 2 });
    expect(affirmative.decide({ highestTurnSequence: 3 })).toEqual({ speak: true, turnSequence: 4 });
    expect(affirmative.decide({ highestTurnSequence: 6 })).toEqual({
      speak: false,
      reason: "debate-finished",
    });
  });

  it("lists the slots held by a role", () => {
    const judge = new DebateTurnPolicy({ roles: ROLES, role: "judge", rounds: 2 });
    expect(judge.slots()).toEqual([
      { role: "judge", turnSequence: 3 },
      { role: "judge", turnSequence: 6 },
    ]);
    expect(judge.roleForTurn(4)).toBe("affirmative");
  });

  it("rejects roles outside the order", () => {
    expect(() => new DebateTurnPolicy({ roles: ROLES, role: "moderator" })).toThrow(
      "role 'moderator' is not part of the debate order",
    );
  });
});
