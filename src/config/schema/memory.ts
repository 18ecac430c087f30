import { z } from "zod";

export const MemorySchema = z
  .object({
    maxEntries: z.number().int().min(2).default(50),
    maxContentChars: z.number().int().positive().default(16_000),
  })
  .strict();

export type MemoryConfig = z.infer<typeof MemorySchema>;
