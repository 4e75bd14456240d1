import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { LogLevel } from '../logging/logger.js';
import { httpUrl } from '../schemas/input.schema.js';

/**
 * Environment variables read by loadConfig. Values are trimmed; empty
 * strings count as unset.
 */
export const ENV_KEYS = {
  url: 'ORCABASE_URL',
  apiKey: 'ORCABASE_API_KEY',
  username: 'ORCABASE_USERNAME',
  password: 'ORCABASE_PASSWORD',
  logLevel: 'ORCABASE_LOG_LEVEL',
} as const;

const envString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const logLevel = z.enum(['error', 'warn', 'info', 'debug']).default('info');

const EnvSchema = z.object({
  [ENV_KEYS.url]: envString.pipe(httpUrl.optional()),
  [ENV_KEYS.apiKey]: envString,
  [ENV_KEYS.username]: envString,
  [ENV_KEYS.password]: envString,
  [ENV_KEYS.logLevel]: envString.pipe(logLevel),
});

export interface ClientConfig {
  /** Spread into any operation's params */
  connection: {
    url?: string;
    apiKey?: string;
    username?: string;
    password?: string;
  };
  logLevel: LogLevel;
}

/**
 * Read connection defaults and the log level from the environment.
 *
 * Connection fields are not required here; each operation validates the
 * merged parameters it receives.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid environment: ${parsed.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`,
      parsed.error.errors,
    );
  }

  const values = parsed.data;
  const connection: ClientConfig['connection'] = {};
  if (values[ENV_KEYS.url]) connection.url = values[ENV_KEYS.url];
  if (values[ENV_KEYS.apiKey]) connection.apiKey = values[ENV_KEYS.apiKey];
  if (values[ENV_KEYS.username]) connection.username = values[ENV_KEYS.username];
  if (values[ENV_KEYS.password]) connection.password = values[ENV_KEYS.password];

  return { connection, logLevel: values[ENV_KEYS.logLevel] };
}
