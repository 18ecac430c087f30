import path from "node:path";
import pc from "picocolors";
import {
  composeSystemPrompt,
  ConfigError,
  loadConfig,
  resolvePersonality,
  type ConfigOverrides,
  type SwarmConfig,
} from "../../config";
import { configureLogger, isLogLevel, logger, LOG_LEVELS } from "../../logger";
import { SwarmAgent } from "../../runtime/agent/agent-loop";
import {
  BACKEND_PROVIDERS,
  createBackend,
  MissingCredentialError,
  type BackendProviderValue,
} from "../../runtime/backends";
import { describeError } from "../../runtime/gateway/errors";
import { RequestGateway } from "../../runtime/gateway/request-gateway";
import { registerProcessErrorHandlers } from "../../runtime/host/process-error-handlers";
import { ConversationMemory } from "../../runtime/memory/conversation-memory";
import { PeerRegistry } from "../../runtime/registry/peer-registry";
import { TtsService } from "../../runtime/tts/tts-service";
import { VoiceOutput } from "../../runtime/tts/voice-output";
import {
  AlwaysSpeakPolicy,
  DebateTurnPolicy,
  ProbabilisticSpeakPolicy,
  type SpeakingPolicy,
} from "../../runtime/turns/speaking-policy";
import { MulticastTransport } from "../../transport/multicast";
import type { DatagramTransport } from "../../transport/types";

/** Raw option values as commander hands them over. */
export type StartCommandOptions = {
  config?: string;
  agentId?: string;
  multicastAddress?: string;
  interface?: string;
  llmBackend?: string;
  model?: string;
  apiKey?: string;
  endpoint?: string;
  timeout?: string;
  maxRetries?: string;
  logLevel?: string;
  personality?: string;
  personalityFile?: string;
  processingDelay?: string;
  voice?: boolean;
  mode?: string;
  role?: string;
  debateRoles?: string;
  rounds?: string;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function isBackendProvider(value: string): value is BackendProviderValue {
  return BACKEND_PROVIDERS.some((provider) => provider === value);
}

function isTurnMode(value: string): value is "free" | "debate" {
  return value === "free" || value === "debate";
}

function parseInteger(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new CliUsageError(`${flag} must be an integer, got '${raw}'`);
  }
  return Number(raw.trim());
}

function parseSecondsAsMs(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const seconds = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(seconds)) {
    throw new CliUsageError(`${flag} must be a number of seconds, got '${raw}'`);
  }
  return Math.round(seconds * 1000);
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) {
    return undefined;
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseHostPort(raw: string): { address: string; port: number } {
  const separator = raw.lastIndexOf(":");
  if (separator <= 0 || separator === raw.length - 1) {
    throw new CliUsageError(`--multicast-address must look like host:port, got '${raw}'`);
  }
  const port = parseInteger("--multicast-address port", raw.slice(separator + 1)) ?? 0;
  if (port < 1 || port > 65535) {
    throw new CliUsageError(`--multicast-address port must be between 1 and 65535, got ${port}`);
  }
  return { address: raw.slice(0, separator), port };
}

/** Turns command-line flags into config overrides; unset flags stay undefined. */
export function buildOverrides(
  options: StartCommandOptions,
  cwd: string = process.cwd(),
): ConfigOverrides {
  const group = options.multicastAddress ? parseHostPort(options.multicastAddress) : undefined;

  let provider: BackendProviderValue | undefined;
  if (options.llmBackend !== undefined) {
    if (!isBackendProvider(options.llmBackend)) {
      throw new CliUsageError(
        `--llm-backend must be one of ${BACKEND_PROVIDERS.join(", ")}, got '${options.llmBackend}'`,
      );
    }
    provider = options.llmBackend;
  }

  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    throw new CliUsageError(
      `--log-level must be one of ${LOG_LEVELS.join(", ")}, got '${options.logLevel}'`,
    );
  }
  if (options.mode !== undefined && !isTurnMode(options.mode)) {
    throw new CliUsageError(`--mode must be free or debate, got '${options.mode}'`);
  }
  if (options.personality !== undefined && options.personalityFile !== undefined) {
    throw new CliUsageError("--personality and --personality-file cannot be used together");
  }

  return {
    agent: {
      id: options.agentId,
      role: options.role,
      personality: options.personality,
      personalityFile:
        options.personalityFile === undefined ? undefined : path.resolve(cwd, options.personalityFile),
      processingDelayMs: parseInteger("--processing-delay", options.processingDelay),
    },
    network: {
      multicastAddress: group?.address,
      port: group?.port,
      interface: options.interface,
    },
    backend: {
      provider,
      model: options.model,
      apiKey: options.apiKey,
      endpoint: options.endpoint,
      timeoutMs: parseSecondsAsMs("--timeout", options.timeout),
      maxRetries: parseInteger("--max-retries", options.maxRetries),
    },
    turns: {
      mode: options.mode !== undefined && isTurnMode(options.mode) ? options.mode : undefined,
      debate: {
        roles: parseList(options.debateRoles),
        rounds: parseInteger("--rounds", options.rounds),
      },
    },
    voice: { enabled: options.voice },
    logging: {
      level: options.logLevel !== undefined && isLogLevel(options.logLevel) ? options.logLevel : undefined,
    },
  };
}

export function createSpeakingPolicy(config: SwarmConfig): SpeakingPolicy {
  const { turns } = config;
  if (turns.mode === "debate") {
    if (!config.agent.role) {
      throw new ConfigError("agent role is required in debate mode");
    }
    return new DebateTurnPolicy({
      roles: turns.debate.roles,
      role: config.agent.role,
      rounds: turns.debate.rounds,
    });
  }
  if (turns.policy === "probabilistic") {
    if (turns.speakProbability === undefined) {
      throw new ConfigError("speakProbability is required when policy is 'probabilistic'");
    }
    return new ProbabilisticSpeakPolicy(turns.speakProbability);
  }
  return new AlwaysSpeakPolicy();
}

export type AssembleAgentOptions = {
  env?: NodeJS.ProcessEnv;
  transport?: DatagramTransport;
};

/** Wires one agent together from a validated config. Nothing touches the network yet. */
export function assembleAgent(config: SwarmConfig, options: AssembleAgentOptions = {}): SwarmAgent {
  const personality = resolvePersonality(config.agent);
  const systemPrompt = composeSystemPrompt({
    personality,
    agentId: config.agent.id,
    role: config.agent.role,
    debate: config.turns.mode === "debate" ? { roles: config.turns.debate.roles } : undefined,
  });
  if (systemPrompt.length >= config.memory.maxContentChars) {
    throw new ConfigError(
      `The system prompt is ${systemPrompt.length} characters, which leaves no room for conversation within memory.maxContentChars (${config.memory.maxContentChars})`,
    );
  }

  const backend = createBackend(
    {
      provider: config.backend.provider,
      model: config.backend.model,
      apiKey: config.backend.apiKey,
      endpoint: config.backend.endpoint,
      temperature: config.backend.temperature,
      maxTokens: config.backend.maxTokens,
    },
    options.env,
  );

  const gateway = new RequestGateway({
    backend,
    timeoutMs: config.backend.timeoutMs,
    maxRetries: config.backend.maxRetries,
    baseDelayMs: config.backend.baseDelayMs,
    maxDelayMs: config.backend.maxDelayMs,
  });

  const transport =
    options.transport ??
    new MulticastTransport({
      address: config.network.multicastAddress,
      port: config.network.port,
      interface: config.network.interface,
    });

  const voice =
    config.voice.enabled && config.voice.player
      ? new VoiceOutput(TtsService.fromConfig(config.voice.tts), config.voice.player)
      : undefined;

  return new SwarmAgent({
    identity: {
      id: config.agent.id,
      personality,
      role: config.agent.role,
      model: config.backend.model,
    },
    transport,
    generator: gateway,
    registry: new PeerRegistry({
      selfId: config.agent.id,
      seenCapacity: config.registry.seenCapacity,
      peerTtlMs: config.registry.peerTtlMs,
    }),
    memory: new ConversationMemory({
      systemPrompt,
      maxEntries: config.memory.maxEntries,
      maxContentChars: config.memory.maxContentChars,
    }),
    policy: createSpeakingPolicy(config),
    timing: {
      quietMs: config.turns.quietMs,
      cooldownMs: config.turns.cooldownMs,
      processingDelayMs: config.agent.processingDelayMs,
      heartbeatIntervalMs: config.registry.heartbeatIntervalMs,
    },
    onFailure: config.turns.onFailure,
    failureNotice: config.turns.failureNotice,
    greeting: config.turns.greeting,
    voice,
  });
}

function fail(title: string, details: string[] = []): never {
  console.error(pc.red(`Error: ${title}`));
  for (const detail of details) {
    console.error(`- ${detail}`);
  }
  process.exit(1);
}

export async function startAgent(options: StartCommandOptions = {}): Promise<void> {
  let overrides: ConfigOverrides;
  try {
    overrides = buildOverrides(options);
  } catch (error) {
    if (error instanceof CliUsageError) {
      fail(error.message);
    }
    throw error;
  }

  const result = loadConfig({ configPath: options.config, overrides });
  if (!result.success || !result.config) {
    fail("invalid configuration.", result.errors);
  }
  const config = result.config;
  configureLogger(config.logging.level);
  registerProcessErrorHandlers();

  let agent: SwarmAgent;
  try {
    agent = assembleAgent(config);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof MissingCredentialError) {
      logger.fatal({ error: error.message }, "Cannot start agent");
      process.exit(1);
    }
    throw error;
  }

  try {
    await agent.start();
  } catch (error) {
    logger.fatal(
      {
        group: `${config.network.multicastAddress}:${config.network.port}`,
        error: describeError(error),
      },
      "Failed to join the swarm",
    );
    await agent.stop();
    process.exit(1);
  }

  console.log(
    pc.green(
      `Agent ${config.agent.id} listening on ${config.network.multicastAddress}:${config.network.port} (${config.backend.provider}/${config.backend.model})`,
    ),
  );

  await new Promise<void>((resolve) => {
    const shutdown = async (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      logger.info({ signal }, "Shutting down");
      try {
        await agent.stop();
      } catch (error) {
        logger.error({ error: describeError(error) }, "Agent did not stop cleanly");
        process.exitCode = 1;
      }
      resolve();
    };
    const onSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}
