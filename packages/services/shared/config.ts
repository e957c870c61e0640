// ============================================
// Configuration
// Loads .env via dotenv and validates process.env with Zod
// ============================================

import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const numberFromEnv = (fallback: number) =>
   z
      .string()
      .trim()
      .optional()
      .transform((raw) => (raw ? Number(raw) : fallback))
      .pipe(z.number().finite());

const optionalString = z
   .string()
   .trim()
   .optional()
   .transform((raw) => (raw ? raw : undefined));

/**
 * Environment schema
 * Every key is read as a string and coerced here, so a typo in a
 * numeric variable fails startup instead of silently becoming NaN
 */
const EnvSchema = z.object({
   OPENAI_API_KEY: z
      .string({ required_error: 'OPENAI_API_KEY is not set' })
      .trim()
      .min(1, 'OPENAI_API_KEY is not set'),
   OPENAI_MODEL: optionalString,
   OPENAI_TEMPERATURE: numberFromEnv(0.7).pipe(z.number().min(0).max(2)),
   OPENAI_MAX_TOKENS: numberFromEnv(500).pipe(z.number().int().positive()),
   LLM_TIMEOUT_MS: numberFromEnv(30_000).pipe(z.number().int().min(1000)),
   KNOWLEDGE_BASE_PATH: optionalString,
   PORT: numberFromEnv(3000).pipe(z.number().int().min(0).max(65535)),
   KAFKA_BROKERS: optionalString,
   KAFKA_CLIENT_ID: optionalString,
   KAFKA_RETRY_BACKOFF_MS: numberFromEnv(30_000).pipe(z.number().int().min(0)),
   SESSION_IDLE_TTL_MS: numberFromEnv(30 * 60 * 1000).pipe(
      z.number().int().positive()
   ),
});

export interface AppConfig {
   openai: {
      apiKey: string;
      model: string;
      temperature: number;
      maxTokens: number;
      timeoutMs: number;
   };
   knowledgeBasePath: string;
   port: number;
   /** Kafka publishing is enabled only when brokers are configured */
   kafka: { brokers: string[]; clientId: string; retryBackoffMs: number } | null;
   sessionIdleTtlMs: number;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_KNOWLEDGE_BASE_PATH = path.join('data', 'courses.json');

/**
 * Build the typed config from an environment map.
 * Pure: callers decide where the variables come from.
 */
export function parseConfig(
   env: Record<string, string | undefined>,
   cwd: string = process.cwd()
): AppConfig {
   const result = EnvSchema.safeParse(env);

   if (!result.success) {
      const details = result.error.issues
         .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
         .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${details}`);
   }

   const values = result.data;
   const brokers = (values.KAFKA_BROKERS ?? '')
      .split(',')
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0);

   return {
      openai: {
         apiKey: values.OPENAI_API_KEY,
         model: values.OPENAI_MODEL ?? DEFAULT_MODEL,
         temperature: values.OPENAI_TEMPERATURE,
         maxTokens: values.OPENAI_MAX_TOKENS,
         timeoutMs: values.LLM_TIMEOUT_MS,
      },
      knowledgeBasePath: path.resolve(
         cwd,
         values.KNOWLEDGE_BASE_PATH ?? DEFAULT_KNOWLEDGE_BASE_PATH
      ),
      port: values.PORT,
      kafka:
         brokers.length > 0
            ? {
                 brokers,
                 clientId: values.KAFKA_CLIENT_ID ?? 'course-assistant',
                 retryBackoffMs: values.KAFKA_RETRY_BACKOFF_MS,
              }
            : null,
      sessionIdleTtlMs: values.SESSION_IDLE_TTL_MS,
   };
}

/**
 * Load .env (if present) into process.env, then validate
 */
export function loadConfig(): AppConfig {
   dotenv.config();
   return parseConfig(process.env);
}
