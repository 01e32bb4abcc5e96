import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_LLM_TIMEOUT_MS,
  PLACEHOLDER_API_KEY,
} from '@costnav/shared/constants/ask.constants.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_LLM_MODEL),
  LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS),
  APP_NAME: z.string().min(1).default('Healthcare Cost Navigator'),
  DEBUG: booleanFlag,
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().default(8000),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export interface LlmSettings {
  /** Undefined when no usable key is configured (assistant runs without the model). */
  apiKey: string | undefined;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface AppConfig {
  databaseUrl: string;
  llm: LlmSettings;
  appName: string;
  debug: boolean;
  nodeEnv: Env['NODE_ENV'];
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: Env['LOG_LEVEL'];
}

export class ConfigError extends Error {
  constructor(public fieldErrors: Record<string, string[] | undefined>) {
    super('Invalid environment variables');
  }
}

/** Load `.env` from the monorepo root into process.env (existing vars win). */
export function loadDotenv(): void {
  const here = path.dirname(fileURLToPath(import.meta.url));
  dotenv.config({ path: path.resolve(here, '../../../../.env') });
}

function usableApiKey(key: string | undefined): string | undefined {
  const trimmed = key?.trim();
  if (!trimmed || trimmed === PLACEHOLDER_API_KEY) return undefined;
  return trimmed;
}

/**
 * Parse configuration once at startup. The returned value is passed to every
 * component that needs it; nothing else reads the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.flatten().fieldErrors);
  }
  const parsed = result.data;

  return Object.freeze({
    databaseUrl: parsed.DATABASE_URL,
    llm: Object.freeze({
      apiKey: usableApiKey(parsed.OPENAI_API_KEY),
      model: parsed.OPENAI_MODEL,
      baseUrl: parsed.LLM_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    }),
    appName: parsed.APP_NAME,
    debug: parsed.DEBUG,
    nodeEnv: parsed.NODE_ENV,
    port: parsed.API_PORT,
    host: parsed.API_HOST,
    corsOrigin: parsed.CORS_ORIGIN,
    logLevel: parsed.DEBUG ? 'debug' : parsed.LOG_LEVEL,
  });
}
