import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "../logger";
import { replaceEnvVars } from "./env";
import { SwarmConfigSchema, type SwarmConfig, type SwarmConfigInput } from "./schema";

export const CONFIG_ENV_VAR = "SWARMCAST_CONFIG";

export interface ConfigLoadResult {
  success: boolean;
  config?: SwarmConfig;
  errors?: string[];
  path: string;
  /** False when the default location had no file and built-in defaults were used. */
  fileFound: boolean;
}

export type ConfigOverrides = {
  [K in Exclude<keyof SwarmConfigInput, "$schema">]?: Partial<NonNullable<SwarmConfigInput[K]>>;
};

export type LoadConfigOptions = {
  configPath?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("~")) {
    return raw;
  }
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): { path: string; explicit: boolean } {
  if (customPath) {
    return { path: path.resolve(expandHomePath(customPath)), explicit: true };
  }
  const envPath = env[CONFIG_ENV_VAR];
  if (envPath) {
    return { path: path.resolve(expandHomePath(envPath)), explicit: true };
  }
  return { path: path.join(os.homedir(), ".swarmcast", "config.jsonc"), explicit: false };
}

/** Resolves file paths inside the config relative to the config file. */
export function applyConfigDefaults(raw: unknown, configDir: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };
  if (isRecord(obj.agent) && typeof obj.agent.personalityFile === "string") {
    obj.agent = {
      ...obj.agent,
      personalityFile: path.resolve(configDir, expandHomePath(obj.agent.personalityFile)),
    };
  }
  return obj;
}

function deepMerge(base: unknown, override: unknown): unknown {
  if (!isRecord(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = isRecord(base) ? { ...base } : {};
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      merged[key] = deepMerge(merged[key], value);
    }
  }
  return merged;
}

/**
 * Layers command-line overrides on top of the file. A personality given on
 * the command line replaces whichever personality source the file names.
 */
export function applyOverrides(raw: unknown, overrides: ConfigOverrides | undefined): unknown {
  if (!overrides) {
    return raw;
  }
  const base = isRecord(raw) ? { ...raw } : {};
  const agentOverride = overrides.agent;
  if (
    isRecord(base.agent) &&
    (agentOverride?.personality !== undefined || agentOverride?.personalityFile !== undefined)
  ) {
    const agent = { ...base.agent };
    delete agent.personality;
    delete agent.personalityFile;
    base.agent = agent;
  }
  return deepMerge(base, overrides);
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  const envFiles = [".env", ".env.local"];

  for (const envFile of envFiles) {
    const envPath = path.join(configDir, envFile);
    if (!fs.existsSync(envPath)) {
      continue;
    }
    const result = loadDotEnv({ path: envPath, override: false });
    if (result.error) {
      throw result.error;
    }
  }
}

function readConfigFile(resolvedPath: string): unknown {
  const raw = fs.readFileSync(resolvedPath, "utf-8");
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const details = parseErrors
      .map((error) => `${printParseErrorCode(error.error)} at offset ${error.offset}`)
      .join(", ");
    throw new Error(`Invalid JSONC in ${resolvedPath}: ${details}`);
  }
  return parsed ?? {};
}

export function formatConfigIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const env = options.env ?? process.env;
  const { path: resolvedPath, explicit } = resolveConfigPath(options.configPath, env);
  const fileFound = fs.existsSync(resolvedPath);
  if (!fileFound && explicit) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
      fileFound,
    };
  }

  try {
    let config: unknown = {};
    if (fileFound) {
      loadConfigLocalEnv(resolvedPath);
      const missing = new Set<string>();
      config = replaceEnvVars(readConfigFile(resolvedPath), env, missing);
      if (missing.size > 0) {
        logger.warn(
          { path: resolvedPath, variables: [...missing] },
          "Config references unset environment variables",
        );
      }
      config = applyConfigDefaults(config, path.dirname(resolvedPath));
    }
    config = applyOverrides(config, options.overrides);

    const result = SwarmConfigSchema.safeParse(config);
    if (!result.success) {
      return {
        success: false,
        errors: formatConfigIssues(result.error.issues),
        path: resolvedPath,
        fileFound,
      };
    }

    return { success: true, config: result.data, path: resolvedPath, fileFound };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
      fileFound,
    };
  }
}
