import { z } from "zod";
import { joinUrl, postJson, requireText } from "./http";
import type {
  BackendProviderValue,
  GenerationSettings,
  LlmBackend,
  PromptContext,
} from "./types";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

export type OpenAiCompatibleOptions = GenerationSettings & {
  provider: BackendProviderValue;
  baseUrl: string;
  apiKey?: string;
  extraHeaders?: Record<string, string>;
};

/** Chat Completions client shared by OpenAI, OpenRouter and Ollama. */
export class OpenAiCompatibleBackend implements LlmBackend {
  readonly provider: BackendProviderValue;
  readonly model: string;

  constructor(private readonly options: OpenAiCompatibleOptions) {
    this.provider = options.provider;
    this.model = options.model;
  }

  async generate(prompt: PromptContext, signal: AbortSignal): Promise<string> {
    const headers: Record<string, string> = { ...this.options.extraHeaders };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const payload = await postJson(
      this.provider,
      {
        url: joinUrl(this.options.baseUrl, "chat/completions"),
        headers,
        body: {
          model: this.model,
          messages: [{ role: "system", content: prompt.systemPrompt }, ...prompt.history],
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        },
        signal,
      },
      chatCompletionSchema,
    );

    return requireText(this.provider, payload.choices[0].message.content ?? "");
  }
}
