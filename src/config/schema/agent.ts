import { z } from "zod";

export const AGENT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;
export const DEFAULT_PERSONALITY =
  "You are a helpful AI agent. Keep responses concise and professional.";

export const AgentSchema = z
  .object({
    id: z
      .string()
      .trim()
      .min(1, "agent id cannot be empty")
      .regex(AGENT_ID_PATTERN, "agent id can only contain letters, digits, hyphens and underscores"),
    role: z.string().trim().min(1).optional(),
    personality: z.string().min(1).optional(),
    personalityFile: z.string().min(1).optional(),
    processingDelayMs: z
      .number()
      .int()
      .min(0)
      .max(60_000, "processing delay cannot exceed 60 seconds")
      .default(0),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.personality !== undefined && value.personalityFile !== undefined) {
      ctx.addIssue({
        code: "custom",
        path: ["personalityFile"],
        message: "personality and personalityFile are mutually exclusive",
      });
    }
  });

export type AgentConfig = z.infer<typeof AgentSchema>;
