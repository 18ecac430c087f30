import { z } from "zod";
import { LOG_LEVELS } from "../../logger";

export const LoggingSchema = z
  .object({
    level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingSchema>;
