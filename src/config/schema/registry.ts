import { z } from "zod";

export const RegistrySchema = z
  .object({
    seenCapacity: z.number().int().positive().default(1024),
    peerTtlMs: z.number().int().positive().default(60_000),
    /** 0 disables heartbeats. */
    heartbeatIntervalMs: z.number().int().min(0).default(15_000),
  })
  .strict();

export type RegistryConfig = z.infer<typeof RegistrySchema>;
