import { z } from "zod";
import { AgentSchema } from "./agent";
import { BackendSchema } from "./backend";
import { LoggingSchema } from "./logging";
import { MemorySchema } from "./memory";
import { NetworkSchema } from "./network";
import { RegistrySchema } from "./registry";
import { TurnsSchema } from "./turns";
import { VoiceConfigSchema } from "./voice";

export const SwarmConfigSchema = z
  .object({
    $schema: z.string().optional(),
    agent: AgentSchema,
    network: NetworkSchema.default({}),
    backend: BackendSchema.default({}),
    memory: MemorySchema.default({}),
    registry: RegistrySchema.default({}),
    turns: TurnsSchema.default({}),
    voice: VoiceConfigSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.turns.mode === "debate") {
      const role = value.agent.role;
      if (!role) {
        ctx.addIssue({
          code: "custom",
          path: ["agent", "role"],
          message: "agent role is required in debate mode",
        });
      } else if (!value.turns.debate.roles.includes(role)) {
        ctx.addIssue({
          code: "custom",
          path: ["agent", "role"],
          message: `role '${role}' is not one of the debate roles (${value.turns.debate.roles.join(", ")})`,
        });
      }
    }

    if (value.voice.enabled && !value.voice.player) {
      ctx.addIssue({
        code: "custom",
        path: ["voice", "player"],
        message: "voice.player is required when voice output is enabled",
      });
    }
  });

export type SwarmConfig = z.infer<typeof SwarmConfigSchema>;
export type SwarmConfigInput = z.input<typeof SwarmConfigSchema>;

export * from "./agent";
export * from "./backend";
export * from "./logging";
export * from "./memory";
export * from "./network";
export * from "./registry";
export * from "./turns";
export * from "./voice";
