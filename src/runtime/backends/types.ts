export const BackendProvider = {
  OPENAI: "openai",
  ANTHROPIC: "anthropic",
  GOOGLE: "google",
  OPENROUTER: "openrouter",
  LOCAL: "local",
} as const;

export type BackendProviderValue = (typeof BackendProvider)[keyof typeof BackendProvider];

export const BACKEND_PROVIDERS = ["openai", "anthropic", "google", "openrouter", "local"] as const;

export type ChatTurn = {
  role: "user" | "assistant";
  content: string;
};

export type PromptContext = {
  systemPrompt: string;
  /** Oldest first; never starts with an assistant turn. */
  history: ChatTurn[];
};

export type GenerationSettings = {
  model: string;
  temperature: number;
  maxTokens: number;
};

/** One remote LLM. Implementations honour `signal` and throw `BackendError` on HTTP failures. */
export interface LlmBackend {
  readonly provider: BackendProviderValue;
  readonly model: string;
  generate(prompt: PromptContext, signal: AbortSignal): Promise<string>;
}
