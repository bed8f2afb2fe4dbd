import { ConfigError } from '../errors/custom-errors';

type Env = Record<string, string | undefined>;

/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} syntax
 *
 * @param value - String that may contain ${VAR_NAME} placeholders
 * @param env - Variables to read, process.env by default
 * @throws ConfigError when a referenced variable is not set
 */
export function resolveEnv(value: string, env: Env = process.env): string {
  return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not set`);
    }
    return envValue;
  });
}

/**
 * Recursively resolve environment variables in every string of a parsed
 * YAML document
 */
export function resolveEnvRecursive(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnv(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvRecursive(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = resolveEnvRecursive(item, env);
    }
    return result;
  }

  return value;
}
