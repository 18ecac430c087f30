import fs from "node:fs";
import { DEFAULT_PERSONALITY, type AgentConfig, type DebateConfig } from "./schema";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function readPersonalityFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Personality file '${filePath}' does not exist`);
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new ConfigError(`'${filePath}' is not a file`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read personality file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  if (!content.trim()) {
    throw new ConfigError(`Personality file '${filePath}' is empty`);
  }
  return content.trim();
}

export function resolvePersonality(agent: Pick<AgentConfig, "personality" | "personalityFile">): string {
  if (agent.personalityFile) {
    return readPersonalityFile(agent.personalityFile);
  }
  return agent.personality?.trim() || DEFAULT_PERSONALITY;
}

/** Pinned system prompt: the personality, plus the seat in a debate. */
export function composeSystemPrompt(params: {
  personality: string;
  agentId: string;
  role?: string;
  debate?: Pick<DebateConfig, "roles">;
}): string {
  const lines = [
    params.personality,
    "",
    `Your name in this conversation is ${params.agentId}. Messages from others are prefixed with their name in brackets.`,
  ];
  if (params.debate && params.role) {
    lines.push(
      `You are taking part in a structured debate as the ${params.role}. Speaking order: ${params.debate.roles.join(", ")}.`,
    );
  }
  return lines.join("\n");
}
