import { z } from "zod";
import { joinUrl, postJson, requireText } from "./http";
import { mergeConsecutiveTurns } from "./prompt";
import type { GenerationSettings, LlmBackend, PromptContext } from "./types";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
const ANTHROPIC_VERSION = "2023-06-01";

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

export type AnthropicOptions = GenerationSettings & {
  apiKey: string;
  baseUrl?: string;
};

export class AnthropicBackend implements LlmBackend {
  readonly provider = "anthropic";
  readonly model: string;

  constructor(private readonly options: AnthropicOptions) {
    this.model = options.model;
  }

  async generate(prompt: PromptContext, signal: AbortSignal): Promise<string> {
    const payload = await postJson(
      this.provider,
      {
        url: joinUrl(this.options.baseUrl ?? ANTHROPIC_BASE_URL, "v1/messages"),
        headers: {
          "x-api-key": this.options.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: {
          model: this.model,
          system: prompt.systemPrompt,
          messages: mergeConsecutiveTurns(prompt.history),
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
        },
        signal,
      },
      messagesResponseSchema,
    );

    const text = payload.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("");
    return requireText(this.provider, text);
  }
}
