const ENV_PATTERN = /\$\{([^}]+)\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Replaces `${VAR}` references in every string of a parsed config tree.
 * Unset variables are left verbatim and their names added to `missing`.
 */
export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
  missing: Set<string> = new Set(),
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match, key: string) => {
      const value = env[key];
      if (value === undefined) {
        missing.add(key);
        return match;
      }
      return value;
    });
  }

  if (Array.isArray(config)) {
    return config.map((item) => replaceEnvVars(item, env, missing));
  }

  if (isPlainObject(config)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = replaceEnvVars(value, env, missing);
    }
    return result;
  }

  return config;
}
