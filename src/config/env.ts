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

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3001),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    LLM_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
    AZURE_OPENAI_API_KEY: optionalNonEmptyString,
    AZURE_OPENAI_ENDPOINT: optionalUrl,
    AZURE_OPENAI_DEPLOYMENT: optionalNonEmptyString,
    PERSISTENCE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DB_HOST: optionalNonEmptyString,
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USERNAME: optionalNonEmptyString,
    DB_PASSWORD: optionalNonEmptyString,
    DB_NAME: optionalNonEmptyString,
    DB_LOGGING: booleanFlag,
    DB_SYNCHRONIZE: booleanFlag,
    PROTOCOL_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
    PROTOCOL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
    PASS_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
    HISTORY_WINDOW: z.coerce.number().int().min(1).default(10),
    RECENCY_WINDOW: z.coerce.number().int().min(1).default(5),
    MAX_HINTS: z.coerce.number().int().min(0).default(3),
  })
  .superRefine((value, ctx) => {
    if (value.PERSISTENCE_DRIVER !== 'postgres') {
      return;
    }

    for (const key of ['DB_HOST', 'DB_USERNAME', 'DB_PASSWORD', 'DB_NAME'] as const) {
      if (!value[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when PERSISTENCE_DRIVER=postgres`,
        });
      }
    }
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
