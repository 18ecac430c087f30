import { z } from "zod";

export const TtsProviderSchema = z.enum(["edge", "openai"]);

export const EdgeTtsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    voice: z.string().min(1).optional(),
    rate: z.string().min(1).optional(),
    pitch: z.string().min(1).optional(),
    format: z.enum(["audio-24khz-48kbitrate-mono-mp3", "riff-24khz-16bit-mono-pcm"]).optional(),
  })
  .strict();

export const OpenAiTtsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    voice: z.string().min(1).optional(),
    format: z.enum(["mp3", "wav"]).optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const TtsConfigSchema = z
  .object({
    maxChars: z.number().int().min(50).max(10000).optional(),
    providerOrder: z.array(TtsProviderSchema).optional(),
    edge: EdgeTtsConfigSchema.optional(),
    openai: OpenAiTtsConfigSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const providerOrder = value.providerOrder ?? [];
    if (value.providerOrder && providerOrder.length === 0) {
      ctx.addIssue({
        code: "custom",
        path: ["providerOrder"],
        message: "providerOrder cannot be empty when tts config is present",
      });
    }

    if (providerOrder.includes("edge") && value.edge?.enabled === false) {
      ctx.addIssue({
        code: "custom",
        path: ["edge", "enabled"],
        message: "edge provider cannot be disabled when included in providerOrder",
      });
    }

    if (providerOrder.includes("openai")) {
      if (!value.openai) {
        ctx.addIssue({
          code: "custom",
          path: ["openai"],
          message: "openai config is required when openai is in providerOrder",
        });
      } else if (!value.openai.apiKey) {
        ctx.addIssue({
          code: "custom",
          path: ["openai", "apiKey"],
          message: "openai apiKey is required when openai is in providerOrder",
        });
      }
    }
  });

/** External audio player; the synthesized file path is appended to `args`. */
export const PlayerConfigSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const VoiceConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    tts: TtsConfigSchema.optional(),
    player: PlayerConfigSchema.optional(),
  })
  .strict();

export type VoiceConfig = z.infer<typeof VoiceConfigSchema>;
export type TtsConfig = z.infer<typeof TtsConfigSchema>;
export type EdgeTtsConfig = z.infer<typeof EdgeTtsConfigSchema>;
export type OpenAiTtsConfig = z.infer<typeof OpenAiTtsConfigSchema>;
export type PlayerConfig = z.infer<typeof PlayerConfigSchema>;
