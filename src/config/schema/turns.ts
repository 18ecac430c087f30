import { z } from "zod";

export const DebateSchema = z
  .object({
    roles: z.array(z.string().trim().min(1)).min(1).default(["affirmative", "negative", "judge"]),
    rounds: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (new Set(value.roles).size !== value.roles.length) {
      ctx.addIssue({
        code: "custom",
        path: ["roles"],
        message: "debate roles must be unique",
      });
    }
  });

export const TurnsSchema = z
  .object({
    mode: z.enum(["free", "debate"]).default("free"),
    quietMs: z.number().int().positive().default(2000),
    cooldownMs: z.number().int().min(0).default(5000),
    policy: z.enum(["always", "probabilistic"]).default("always"),
    speakProbability: z.number().min(0).max(1).optional(),
    onFailure: z.enum(["skip", "notice"]).default("skip"),
    failureNotice: z.string().min(1).optional(),
    greeting: z.string().default("Hi"),
    debate: DebateSchema.default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.policy === "probabilistic" && value.speakProbability === undefined) {
      ctx.addIssue({
        code: "custom",
        path: ["speakProbability"],
        message: "speakProbability is required when policy is 'probabilistic'",
      });
    }
  });

export type TurnsConfig = z.infer<typeof TurnsSchema>;
export type DebateConfig = z.infer<typeof DebateSchema>;
