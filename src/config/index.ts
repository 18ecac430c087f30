export {
  applyOverrides,
  CONFIG_ENV_VAR,
  loadConfig,
  resolveConfigPath,
  type ConfigLoadResult,
  type ConfigOverrides,
  type LoadConfigOptions,
} from "./loader";
export { composeSystemPrompt, ConfigError, readPersonalityFile, resolvePersonality } from "./personality";
export { SwarmConfigSchema, type SwarmConfig, type SwarmConfigInput } from "./schema";
