import { config } from 'dotenv';
import { z } from 'zod';

const optionalKey = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  OPENAI_API_KEY: optionalKey,
  GEMINI_API_KEY: optionalKey,
  TEXT_PROVIDER: z.enum(['openai', 'gemini', 'mock']).default('openai'),
  TEXT_MODEL: optionalKey,
  IMAGE_PROVIDER: z.enum(['gemini', 'mock']).default('gemini'),
  IMAGE_MODEL: z.string().min(1).default('gemini-3-pro-image-preview'),
  IMAGE_FALLBACK_MODELS: z
    .string()
    .default('gemini-2.5-flash-image')
    .transform((value) =>
      value
        .split(',')
        .map((model) => model.trim())
        .filter((model) => model.length > 0)
    ),
  IMAGE_RPM: z.coerce.number().min(0).default(6),
  OUTPUT_ROOT: z.string().min(1).default('output'),
  CONCURRENCY: z.coerce.number().int().min(1, 'CONCURRENCY must be at least 1').default(2),
  RETRY_STRATEGY: z.enum(['fixed', 'exponential']).default('exponential'),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20, 'RETRY_MAX_ATTEMPTS must be at most 20').default(6)
});

export type AppEnv = z.infer<typeof envSchema>;

let cachedEnv: AppEnv | null = null;

export const loadEnv = (options?: { path?: string }): AppEnv => {
  if (!cachedEnv) {
    config({ path: options?.path });
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const formatted = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ');
      throw new Error(`Invalid environment configuration: ${formatted}`);
    }
    cachedEnv = parsed.data;
  }
  return cachedEnv;
};

export const resetEnvCacheForTesting = () => {
  cachedEnv = null;
};
