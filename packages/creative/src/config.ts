import fs from 'fs-extra';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppEnv } from '@adforge/shared/env';
import { errorMessage } from '@adforge/shared/utils';
import { resolveProductDir } from './artifacts.js';
import { AuthError, InputError } from './errors.js';
import { DEFAULT_ANGLE_COUNT } from './promptTemplates.js';
import type { ImageProviderName, TextProviderName } from './providers/index.js';
import { ProductSchema, type Product } from './types.js';
import { BackoffPolicySchema, type BackoffPolicy } from './util/retry.js';

export const IMAGE_SIZES = ['1K', '2K', '4K'] as const;
export type ImageSize = (typeof IMAGE_SIZES)[number];

export interface RunConfig {
  readonly product: Product;
  readonly outputRoot: string;
  readonly productDir: string;
  readonly textProvider: TextProviderName;
  readonly textModel?: string;
  readonly imageProvider: ImageProviderName;
  readonly imageModel: string;
  /** Tried in order when the image model keeps failing. */
  readonly imageFallbackModels: readonly string[];
  /** Requests per minute for image generation; 0 means unpaced. */
  readonly imageRpm: number;
  readonly keys: { readonly openaiApiKey?: string; readonly geminiApiKey?: string };
  readonly backoff: BackoffPolicy;
  readonly concurrency: number;
  readonly angleCount: number;
  readonly maxReferenceImages: number;
  readonly imageSize: ImageSize;
  readonly aspectRatio: string;
  readonly force: boolean;
}

/** Values from the command line; anything left undefined falls back to the environment. */
export interface RunConfigInput {
  product: Partial<Product>;
  outputRoot?: string;
  textProvider?: string;
  textModel?: string;
  imageProvider?: string;
  imageModel?: string;
  imageFallbackModels?: string[];
  imageRpm?: number;
  concurrency?: number;
  angleCount?: number;
  maxReferenceImages?: number;
  imageSize?: string;
  backoff?: string;
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  maxAttempts?: number;
  force?: boolean;
}

const TextProviderSchema = z.enum(['openai', 'gemini', 'mock']);
const ImageProviderSchema = z.enum(['gemini', 'mock']);

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join(', ');

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InputError(`Invalid ${label}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

const positiveInt = (label: string) => z.number({ invalid_type_error: `${label} must be a number` }).int().min(1);

/**
 * Merges command-line input over the environment into one frozen config that is
 * passed explicitly to every stage.
 */
export function createRunConfig(input: RunConfigInput, env: AppEnv): RunConfig {
  const product = parseOrThrow(ProductSchema, input.product, 'product');
  const outputRoot = input.outputRoot ?? env.OUTPUT_ROOT;
  const strategy = input.backoff ?? env.RETRY_STRATEGY;
  const baseDelayMs = input.retryDelayMs ?? env.RETRY_BASE_DELAY_MS;

  const backoff = parseOrThrow(
    BackoffPolicySchema,
    {
      strategy,
      baseDelayMs,
      maxDelayMs: input.maxRetryDelayMs ?? Math.max(env.RETRY_MAX_DELAY_MS, baseDelayMs),
      maxAttempts: input.maxAttempts ?? env.RETRY_MAX_ATTEMPTS
    },
    'backoff policy'
  );

  const config: RunConfig = {
    product,
    outputRoot,
    productDir: resolveProductDir(outputRoot, product.name),
    textProvider: parseOrThrow(TextProviderSchema, input.textProvider ?? env.TEXT_PROVIDER, 'text provider'),
    textModel: input.textModel ?? env.TEXT_MODEL,
    imageProvider: parseOrThrow(ImageProviderSchema, input.imageProvider ?? env.IMAGE_PROVIDER, 'image provider'),
    imageModel: input.imageModel ?? env.IMAGE_MODEL,
    imageFallbackModels: Object.freeze([...(input.imageFallbackModels ?? env.IMAGE_FALLBACK_MODELS)]),
    imageRpm: parseOrThrow(z.number().min(0), input.imageRpm ?? env.IMAGE_RPM, 'image rpm'),
    keys: Object.freeze({ openaiApiKey: env.OPENAI_API_KEY, geminiApiKey: env.GEMINI_API_KEY }),
    backoff: Object.freeze(backoff),
    concurrency: parseOrThrow(positiveInt('concurrency'), input.concurrency ?? env.CONCURRENCY, 'concurrency'),
    angleCount: parseOrThrow(positiveInt('angles'), input.angleCount ?? DEFAULT_ANGLE_COUNT, 'angle count'),
    maxReferenceImages: parseOrThrow(
      z.number().int().min(0).max(14),
      input.maxReferenceImages ?? 5,
      'max reference images'
    ),
    imageSize: parseOrThrow(z.enum(IMAGE_SIZES), input.imageSize ?? '4K', 'image size'),
    aspectRatio: '1:1',
    force: input.force ?? false
  };

  return Object.freeze({ ...config, product: Object.freeze(product) });
}

/** Reads a product definition from YAML or JSON. */
export async function loadProductFile(filePath: string): Promise<Partial<Product>> {
  if (!(await fs.pathExists(filePath))) {
    throw new InputError(`Product file not found: ${filePath}`);
  }
  const text = await fs.readFile(filePath, 'utf8');
  let data: unknown;
  try {
    data = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(text) : YAML.parse(text);
  } catch (error) {
    throw new InputError(`Could not parse ${filePath}: ${errorMessage(error)}`);
  }
  return parseOrThrow(ProductSchema.partial(), data ?? {}, `product file ${filePath}`);
}

/** Fails fast when a selected provider has no key, before any stage runs. */
export function assertCredentials(config: RunConfig, needs: { text: boolean; images: boolean }): void {
  const missing: string[] = [];
  if (needs.text) {
    if (config.textProvider === 'openai' && !config.keys.openaiApiKey) missing.push('OPENAI_API_KEY');
    if (config.textProvider === 'gemini' && !config.keys.geminiApiKey) missing.push('GEMINI_API_KEY');
  }
  if (needs.images && config.imageProvider === 'gemini' && !config.keys.geminiApiKey) {
    missing.push('GEMINI_API_KEY');
  }
  if (missing.length > 0) {
    throw new AuthError(`Missing credentials: ${Array.from(new Set(missing)).join(', ')}`);
  }
}
