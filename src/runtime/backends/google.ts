import { z } from "zod";
import { joinUrl, postJson, requireText } from "./http";
import { mergeConsecutiveTurns } from "./prompt";
import type { GenerationSettings, LlmBackend, PromptContext } from "./types";

export const GOOGLE_BASE_URL = "https://generativelanguage.googleapis.com";

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      }),
    )
    .min(1),
});

export type GoogleOptions = GenerationSettings & {
  apiKey: string;
  baseUrl?: string;
};

export class GoogleBackend implements LlmBackend {
  readonly provider = "google";
  readonly model: string;

  constructor(private readonly options: GoogleOptions) {
    this.model = options.model;
  }

  async generate(prompt: PromptContext, signal: AbortSignal): Promise<string> {
    const path = `v1beta/models/${encodeURIComponent(this.model)}:generateContent`;
    const payload = await postJson(
      this.provider,
      {
        url: joinUrl(this.options.baseUrl ?? GOOGLE_BASE_URL, path),
        headers: { "x-goog-api-key": this.options.apiKey },
        body: {
          systemInstruction: { parts: [{ text: prompt.systemPrompt }] },
          contents: mergeConsecutiveTurns(prompt.history).map((turn) => ({
            role: turn.role === "assistant" ? "model" : "user",
            parts: [{ text: turn.content }],
          })),
          generationConfig: {
            temperature: this.options.temperature,
            maxOutputTokens: this.options.maxTokens,
          },
        },
        signal,
      },
      generateContentSchema,
    );

    const parts = payload.candidates[0].content?.parts ?? [];
    return requireText(this.provider, parts.map((part) => part.text ?? "").join(""));
  }
}
