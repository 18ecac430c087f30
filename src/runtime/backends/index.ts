import { AnthropicBackend } from "./anthropic";
import { GoogleBackend } from "./google";
import { OpenAiCompatibleBackend } from "./openai-compatible";
import { BackendProvider, type BackendProviderValue, type LlmBackend } from "./types";

export { buildPrompt, formatPeerTurn, mergeConsecutiveTurns } from "./prompt";
export * from "./types";

const ENV_MAP: Record<BackendProviderValue, string | undefined> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GEMINI_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  local: undefined,
};

const OPENAI_BASE_URL = "https://api.openai.com/v1";
const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
const LOCAL_BASE_URL = "http://localhost:11434/v1";

export type BackendClientOptions = {
  provider: BackendProviderValue;
  model: string;
  apiKey?: string;
  endpoint?: string;
  temperature: number;
  maxTokens: number;
};

export class MissingCredentialError extends Error {
  constructor(
    readonly provider: BackendProviderValue,
    readonly envVar: string | undefined,
  ) {
    super(
      envVar
        ? `No API key for ${provider}: set backend.apiKey, --api-key or ${envVar}`
        : `No API key for ${provider}`,
    );
    this.name = "MissingCredentialError";
  }
}

export function resolveApiKey(
  provider: BackendProviderValue,
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (explicit?.trim()) {
    return explicit.trim();
  }
  const envKey = ENV_MAP[provider];
  if (!envKey) {
    return undefined;
  }
  const value = env[envKey];
  return value && value.trim() ? value.trim() : undefined;
}

function requireApiKey(options: BackendClientOptions, env: NodeJS.ProcessEnv): string {
  const apiKey = resolveApiKey(options.provider, options.apiKey, env);
  if (!apiKey) {
    throw new MissingCredentialError(options.provider, ENV_MAP[options.provider]);
  }
  return apiKey;
}

export function createBackend(
  options: BackendClientOptions,
  env: NodeJS.ProcessEnv = process.env,
): LlmBackend {
  const settings = {
    model: options.model,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  };

  switch (options.provider) {
    case BackendProvider.OPENAI:
      return new OpenAiCompatibleBackend({
        ...settings,
        provider: options.provider,
        baseUrl: options.endpoint ?? OPENAI_BASE_URL,
        apiKey: requireApiKey(options, env),
      });
    case BackendProvider.OPENROUTER:
      return new OpenAiCompatibleBackend({
        ...settings,
        provider: options.provider,
        baseUrl: options.endpoint ?? OPENROUTER_BASE_URL,
        apiKey: requireApiKey(options, env),
        extraHeaders: { "X-Title": "swarmcast" },
      });
    case BackendProvider.LOCAL:
      return new OpenAiCompatibleBackend({
        ...settings,
        provider: options.provider,
        baseUrl: options.endpoint ?? LOCAL_BASE_URL,
        apiKey: resolveApiKey(options.provider, options.apiKey, env),
      });
    case BackendProvider.ANTHROPIC:
      return new AnthropicBackend({
        ...settings,
        apiKey: requireApiKey(options, env),
        baseUrl: options.endpoint,
      });
    case BackendProvider.GOOGLE:
      return new GoogleBackend({
        ...settings,
        apiKey: requireApiKey(options, env),
        baseUrl: options.endpoint,
      });
  }
}
