import { config } from 'dotenv';
import { z } from 'zod';

config();

const numeric = /^[0-9]+$/;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.string().regex(/^\d+$/).default('3333'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  RESPONSE_MASKING_ENABLED: z.enum(['true', 'false']).default('true'),
  JWT_SECRET: z.string().min(32),
  SESSION_TTL_MINUTES: z.string().regex(numeric).default('240'),
  REDIS_URL: z.string().url().optional(),
  CACHE_TTL_SECONDS: z.string().regex(numeric).default('300'),
  PLATFORM_DEFAULT_SERVER_URL: z.string().url().default('https://eu.kobotoolbox.org'),
  PLATFORM_REQUEST_TIMEOUT_MS: z.string().regex(numeric).default('180000'),
  SEARCH_DEFAULT_THRESHOLD: z
    .string()
    .regex(numeric)
    .refine((value) => Number(value) <= 100, 'Must be between 0 and 100')
    .default('80'),
  SEARCH_DEFAULT_METHOD: z
    .enum(['ratio', 'partial_ratio', 'token_sort_ratio', 'token_set_ratio', 'weighted_ratio'])
    .default('token_set_ratio'),
  RATE_LIMIT_MAX: z.string().regex(numeric).default('100'),
  RATE_LIMIT_TIME_WINDOW_MS: z.string().regex(numeric).default('60000'),
  OTEL_ENABLED: z.enum(['true', 'false']).default('false'),
  OTEL_SERVICE_NAME: z.string().default('survey-insights-api'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default('http://localhost:4318'),
  OTEL_EXPORTER_OTLP_HEADERS: z.string().optional(),
  OTEL_METRICS_EXPORT_INTERVAL_MS: z.string().regex(numeric).default('60000'),
  OTEL_METRICS_EXPORT_TIMEOUT_MS: z.string().regex(numeric).default('30000'),
  OTEL_TRACES_SAMPLER: z
    .enum(['always_on', 'always_off', 'traceidratio', 'parentbased_always_on', 'parentbased_always_off'])
    .default('parentbased_always_on'),
  OTEL_TRACES_SAMPLER_ARG: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  const source = { ...process.env };

  if (source.NODE_ENV === 'test') {
    source.RESPONSE_MASKING_ENABLED = source.RESPONSE_MASKING_ENABLED ?? 'false';
    return envSchema.parse(source);
  }

  if (!cachedEnv) {
    cachedEnv = envSchema.parse(source);
  }

  return cachedEnv;
}
