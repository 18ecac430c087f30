import { z } from "zod";
import { BACKEND_PROVIDERS } from "../../runtime/backends/types";

export const BackendProviderSchema = z.enum(BACKEND_PROVIDERS);

export const BackendSchema = z
  .object({
    provider: BackendProviderSchema.default("openai"),
    model: z.string().trim().min(1, "model name cannot be empty").default("gpt-3.5-turbo"),
    apiKey: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    timeoutMs: z
      .number()
      .int()
      .min(1000, "timeout must be between 1 and 300 seconds")
      .max(300_000, "timeout must be between 1 and 300 seconds")
      .default(30_000),
    maxRetries: z.number().int().min(0).max(10, "max retries cannot exceed 10").default(3),
    baseDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(30_000),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(1024),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.baseDelayMs > value.maxDelayMs) {
      ctx.addIssue({
        code: "custom",
        path: ["baseDelayMs"],
        message: "baseDelayMs must be less than or equal to maxDelayMs",
      });
    }
  });

export type BackendConfig = z.infer<typeof BackendSchema>;
