/**
 * Runtime configuration, read from environment variables
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export const LOG_FORMATS = ['text', 'json'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface AppConfig {
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export class ConfigError extends Error {
  constructor(
    public variable: string,
    public value: string
  ) {
    super(`Invalid value for ${variable}: "${value}"`);
    this.name = 'ConfigError';
  }
}

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

function readChoice<T extends string>(
  env: NodeJS.ProcessEnv,
  variable: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = raw.trim().toLowerCase();
  if (!isOneOf(allowed, value)) {
    throw new ConfigError(variable, raw);
  }
  return value;
}

/**
 * Build config from an environment (defaults to process.env)
 *
 * @throws ConfigError if LOG_LEVEL or LOG_FORMAT holds an unknown value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logLevel: readChoice(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    logFormat: readChoice(env, 'LOG_FORMAT', LOG_FORMATS, 'text'),
  };
}
