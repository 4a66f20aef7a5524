/**
 * @fileoverview Environment configuration.
 *
 * Every setting comes from an environment variable, optionally seeded from
 * a `.env` file. Blank values count as unset, so `OPENAI_MODEL=` falls back
 * to the default model.
 *
 * @module math-reasoning-agent/config
 * @version 0.1.0
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_AGENT_CONFIG, Severity, type AgentConfig } from '../types/core.types.js';
import { DEFAULT_OPENAI_ENDPOINT, DEFAULT_OPENAI_MODEL } from '../providers/openai.js';
import { ConfigError } from '../errors/errors.js';

export const DEFAULT_LOG_FILE = 'math-agent.log';
export const DEFAULT_ENV_FILE = '.env';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const upperCase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_OPENAI_ENDPOINT)),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_OPENAI_MODEL)),
  AGENT_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_AGENT_CONFIG.requestTimeoutMs),
  ),
  AGENT_MAX_HISTORY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_AGENT_CONFIG.maxHistory),
  ),
  AGENT_CONTEXT_WINDOW: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_AGENT_CONFIG.contextWindow),
  ),
  AGENT_TOLERANCE: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(DEFAULT_AGENT_CONFIG.tolerance),
  ),
  LOG_LEVEL: z.preprocess(
    value => upperCase(blankToUndefined(value)),
    z.nativeEnum(Severity).default(Severity.INFO),
  ),
  LOG_FILE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_LOG_FILE)),
});

/**
 * Validated application settings.
 */
export interface AppConfig {
  readonly apiKey: string | undefined;
  readonly baseUrl: string;
  readonly model: string;
  readonly agent: AgentConfig;
  readonly logLevel: Severity;
  readonly logFile: string;
}

/**
 * Reads and validates configuration from the environment.
 *
 * @throws {@link ConfigError} naming every invalid variable
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    apiKey: values.OPENAI_API_KEY,
    baseUrl: values.OPENAI_BASE_URL,
    model: values.OPENAI_MODEL,
    agent: {
      requestTimeoutMs: values.AGENT_TIMEOUT_MS,
      maxHistory: values.AGENT_MAX_HISTORY,
      contextWindow: values.AGENT_CONTEXT_WINDOW,
      tolerance: values.AGENT_TOLERANCE,
    },
    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE,
  };
}

/**
 * Loads a `.env` file into `process.env`. Variables that are already set
 * keep their values, and a missing file is skipped.
 *
 * @returns The names of the variables defined in the file
 * @throws {@link ConfigError} when the file exists but cannot be read
 */
export function loadEnvFile(path: string = DEFAULT_ENV_FILE): string[] {
  const { parsed, error } = loadDotenv({ path });
  if (error !== undefined) {
    if ('code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new ConfigError([`${path}: ${error.message}`]);
  }
  return Object.keys(parsed ?? {});
}
