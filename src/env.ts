import { config } from 'dotenv';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_LOG_LEVEL, DEFAULT_NODE_ENV } from './shared/constants.js';

// Load .env file before validation
config();

/**
 * Schema for all environment variables consumed by the CLI.
 * Everything has a default; a malformed value fails at startup.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default(DEFAULT_NODE_ENV),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default(DEFAULT_LOG_LEVEL),

  /** Settings file; created with defaults on first use. */
  CPFETCH_CONFIG_PATH: z
    .string()
    .min(1)
    .default(join(homedir(), '.config', 'cpfetch', 'config.json')),
  /** Directory holding the persisted cookie cache. */
  CPFETCH_CACHE_DIR: z
    .string()
    .min(1)
    .default(join(homedir(), '.cache', 'cpfetch')),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment record. Exported separately from `env` so tests
 * can validate fixtures without touching process.env.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Invalid environment variables:\n${formatted}`);
  }

  return result.data;
}

/**
 * Typed, validated environment variables.
 * Importing this module eagerly parses process.env.
 */
export const env: Env = parseEnv(process.env);
