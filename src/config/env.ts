import 'dotenv/config';

import { z } from 'zod';

const optionalNonEmptyString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().min(1).optional());

const optionalUrl = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().url().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CORS_ORIGIN: optionalNonEmptyString,
  LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  OPENAI_API_KEY: optionalNonEmptyString,
  AZURE_OPENAI_API_KEY: optionalNonEmptyString,
  AZURE_OPENAI_ENDPOINT: optionalUrl,
  AZURE_OPENAI_DEPLOYMENT: optionalNonEmptyString,
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(6).default(2),
  SESSION_TICK_LIMIT: z.coerce.number().int().min(4).max(64).default(16),
  FINAL_TEST_QUESTION_COUNT: z.coerce.number().int().min(1).max(20).default(6),
  PREREQUISITE_QUIZ_QUESTION_COUNT: z.coerce.number().int().min(1).max(10).default(4),
  DB_HOST: z.string().trim().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().trim().default('postgres'),
  DB_PASSWORD: z.string().trim().default('postgres'),
  DB_NAME: z.string().trim().default('mastery_tutor'),
  DB_LOGGING: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
