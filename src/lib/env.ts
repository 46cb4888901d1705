import { z } from 'zod';
import { ConfigurationError } from './ingest/errors';

const booleanFromEnv = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', '0', 'no', 'off', ''].includes(normalized)) {
      return false;
    }
  }
  return value;
}, z.boolean());

const cronExpression = z
  .string()
  .min(1, 'cron expression must not be empty')
  .regex(
    /^([^\s]+\s){4}[^\s]+$/,
    'cron expression must contain five sections',
  );

const commaSeparatedList = z
  .string()
  .optional()
  .transform((value) =>
    value ? value.split(',').map((item) => item.trim().toLowerCase()).filter(Boolean) : [],
  );

export const DEFAULT_DENYLIST = [
  'spam',
  'adult',
  'casino',
  'gambling',
  'porn',
  'xxx',
  'bitcoin',
  'crypto',
  'scam',
];

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a valid URL'),
  DATABASE_SSLMODE: z.enum(['disable', 'require', 'verify-full']).optional(),
  INGEST_TARGET_COUNT: z.coerce.number().int().positive().default(10_000),
  INGEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(60_000)
    .default(10_000),
  INGEST_RETRY_LIMIT: z.coerce.number().int().nonnegative().max(5).default(2),
  INGEST_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  INGEST_PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  INGEST_RUN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  INGEST_MAX_CONSECUTIVE_STORE_ERRORS: z.coerce.number().int().positive().default(3),
  INGEST_SOURCES: commaSeparatedList,
  INGEST_DENYLIST: commaSeparatedList.transform((value) =>
    value.length > 0 ? value : DEFAULT_DENYLIST,
  ),
  CURATED_QUOTES_PATH: z.string().min(1).optional(),
  TRANSLATE_ENABLED: booleanFromEnv.default(true),
  TRANSLATE_ENDPOINT: z
    .string()
    .url('TRANSLATE_ENDPOINT must be a valid URL')
    .default('https://translate.googleapis.com/translate_a/single'),
  TRANSLATE_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(500),
  TRANSLATE_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(60_000)
    .default(10_000),
  TRANSLATE_RETRY_LIMIT: z.coerce.number().int().nonnegative().max(5).default(1),
  ENABLE_INTERNAL_CRON: booleanFromEnv.default(false),
  INGEST_CRON: cronExpression.default('0 3 * * *'),
  HTTP_USER_AGENT: z.string().min(1).default('quotation-ingest/1.0'),
});

export type AppEnv = z.infer<typeof envSchema>;

export function loadEnv(
  input: NodeJS.ProcessEnv = process.env,
): AppEnv {
  const result = envSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid environment variables: ${messages.join(', ')}`, {
      details: { variables: result.error.issues.map((issue) => issue.path.join('.')) },
    });
  }
  return result.data;
}

let cachedEnv: AppEnv | null = null;

export function getEnv(): AppEnv {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
}

export function resetEnvCache(): void {
  cachedEnv = null;
}
