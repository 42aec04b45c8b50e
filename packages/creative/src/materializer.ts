import path from 'node:path';
import fs from 'fs-extra';
import { globby } from 'globby';
import pLimit from 'p-limit';
import { createScopedLogger } from '@adforge/shared/logger';
import { errorMessage, nowIso, slugify } from '@adforge/shared/utils';
import {
  ArtifactStore,
  ARTIFACT_FILES,
  ASSET_DIRS,
  MANIFEST_FILE,
  REFERENCE_IMAGES_DIR,
  writeFileAtomic,
  writeJsonAtomic
} from './artifacts.js';
import type { RunConfig } from './config.js';
import { FatalModelError, InputError, RetryExhaustedError } from './errors.js';
import { buildImagePrompt, type ImagePromptEntry } from './promptTemplates.js';
import type { GeneratedImage, ImageModel, ImageRequest, ReferenceImage } from './providers/base.js';
import {
  CANCELLED,
  CarouselSpecSchema,
  ImagePromptSetSchema,
  ThumbnailPromptSetSchema,
  type AssetEntryResult,
  type AssetKind,
  type CreativeStage,
  type MaterializeReport
} from './types.js';
import { intervalFromRpm, RequestPacer } from './util/pacer.js';
import { withRetry, type Sleep } from './util/retry.js';

const logger = createScopedLogger('materializer');

export const SOURCE_STAGES: Record<AssetKind, CreativeStage> = {
  images: 'image-prompts',
  thumbnails: 'thumbnail-prompts',
  carousel: 'carousel'
};

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp'
};

const EXTENSION_BY_MIME: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp'
};

const IMAGE_GLOB = '*.{png,jpg,jpeg,webp,PNG,JPG,JPEG,WEBP}';

export interface MaterializeDeps {
  imageModel: ImageModel;
  sleep?: Sleep;
  signal?: AbortSignal;
  /** Shared across calls so several asset kinds stay within one request budget. */
  pacer?: RequestPacer;
}

function formatIssue(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
}

function readEntries(kind: AssetKind, artifact: unknown): ImagePromptEntry[] {
  const source = ARTIFACT_FILES[SOURCE_STAGES[kind]];

  switch (kind) {
    case 'images': {
      const parsed = ImagePromptSetSchema.safeParse(artifact);
      if (!parsed.success) throw new InputError(`${source} is invalid: ${formatIssue(parsed.error)}`);
      return parsed.data.prompts.map((entry) => ({
        id: entry.id,
        prompt: entry.prompt,
        textOverlays: entry.textOverlays,
        negativePrompt: entry.negativePrompt
      }));
    }
    case 'thumbnails': {
      const parsed = ThumbnailPromptSetSchema.safeParse(artifact);
      if (!parsed.success) throw new InputError(`${source} is invalid: ${formatIssue(parsed.error)}`);
      return parsed.data.thumbnails.map((entry) => ({
        id: entry.id,
        prompt: entry.prompt,
        textOverlays: entry.textOverlays.length > 0 ? entry.textOverlays : [entry.headline]
      }));
    }
    case 'carousel': {
      const parsed = CarouselSpecSchema.safeParse(artifact);
      if (!parsed.success) throw new InputError(`${source} is invalid: ${formatIssue(parsed.error)}`);
      return parsed.data.carousels.flatMap((carousel) =>
        carousel.cards.map((card) => ({
          id: `${carousel.id}_card${card.index}`,
          prompt: card.imagePrompt,
          textOverlays: [card.headline]
        }))
      );
    }
  }
}

/** Turns a prompt artifact into image entries with unique, stable ids. */
export function collectPromptEntries(kind: AssetKind, artifact: unknown): ImagePromptEntry[] {
  const entries = readEntries(kind, artifact);
  const used = new Set<string>();
  return entries.map((entry, index) => {
    const base = slugify(entry.id) || `entry_${index + 1}`;
    let id = base;
    for (let suffix = 2; used.has(id); suffix += 1) {
      id = `${base}_${suffix}`;
    }
    used.add(id);
    return { ...entry, id };
  });
}

/** Operator-supplied photos under `<productDir>/product_images`, sorted by name. */
export async function loadReferenceImages(productDir: string, max: number): Promise<ReferenceImage[]> {
  const dir = path.join(productDir, REFERENCE_IMAGES_DIR);
  if (max === 0 || !(await fs.pathExists(dir))) return [];

  const files = (await globby(IMAGE_GLOB, { cwd: dir, onlyFiles: true })).sort().slice(0, max);
  return Promise.all(
    files.map(async (fileName) => ({
      fileName,
      mimeType: MIME_BY_EXTENSION[path.extname(fileName).toLowerCase()] ?? 'image/png',
      data: await fs.readFile(path.join(dir, fileName))
    }))
  );
}

async function findExisting(outputDir: string, id: string): Promise<string | undefined> {
  const [existing] = await globby(`${id}.{png,jpg,webp}`, { cwd: outputDir, onlyFiles: true });
  return existing;
}

// Auth failures hit every model alike; anything else may work on the next one.
const canFallBack = (error: unknown): boolean =>
  error instanceof RetryExhaustedError || (error instanceof FatalModelError && error.category !== 'auth');

interface FallbackOptions {
  models: readonly string[];
  label: string;
  config: RunConfig;
  deps: MaterializeDeps;
  pacer: RequestPacer;
}

/** Tries each model in order until one returns an image. */
async function generateWithFallback(
  request: Omit<ImageRequest, 'model'>,
  { models, label, config, deps, pacer }: FallbackOptions
): Promise<{ image: GeneratedImage; model: string }> {
  let lastError: unknown = new Error('No image model configured');
  for (const model of models) {
    try {
      const image = await withRetry(
        async () => {
          await pacer.wait(deps.signal);
          return deps.imageModel.generate({ ...request, model });
        },
        { policy: config.backoff, label: `${label}@${model}`, sleep: deps.sleep, signal: deps.signal }
      );
      return { image, model };
    } catch (error) {
      if (!canFallBack(error)) throw error;
      lastError = error;
      logger.warn({ id: request.id, model, error: errorMessage(error) }, 'Image model failed');
    }
  }
  throw lastError;
}

/**
 * Generates one image per prompt entry. Entries fail independently; the
 * per-entry outcome is written to `manifest.json` in the asset directory.
 */
export async function materializeAssets(
  kind: AssetKind,
  config: RunConfig,
  deps: MaterializeDeps
): Promise<MaterializeReport> {
  const store = new ArtifactStore(config.productDir);
  const sourceStage = SOURCE_STAGES[kind];
  const artifact = await store.read(sourceStage);
  if (artifact === undefined) {
    throw new InputError(`Missing ${store.pathFor(sourceStage)}; run the ${sourceStage} stage first`);
  }

  const entries = collectPromptEntries(kind, artifact);
  const references = await loadReferenceImages(config.productDir, config.maxReferenceImages);
  const outputDir = path.join(config.productDir, ASSET_DIRS[kind]);
  await fs.ensureDir(outputDir);

  logger.info(
    { kind, entries: entries.length, references: references.length, outputDir, model: config.imageModel },
    'Materializing assets'
  );

  const models = [config.imageModel, ...config.imageFallbackModels.filter((model) => model !== config.imageModel)];
  const pacer = deps.pacer ?? new RequestPacer(intervalFromRpm(config.imageRpm), deps.sleep);

  const limit = pLimit(config.concurrency);
  const results = await Promise.all(
    entries.map((entry) =>
      limit(async (): Promise<AssetEntryResult> => {
        if (deps.signal?.aborted) {
          return { id: entry.id, status: 'failed', error: CANCELLED };
        }
        try {
          const existing = await findExisting(outputDir, entry.id);
          if (existing && !config.force) {
            logger.info({ id: entry.id, file: existing }, 'Image exists, skipping');
            return { id: entry.id, status: 'skipped', file: existing };
          }

          const prompt = buildImagePrompt(entry, {
            aspectRatio: config.aspectRatio,
            hasReferences: references.length > 0
          });
          const promptFile = `${entry.id}.prompt.json`;
          await writeJsonAtomic(path.join(outputDir, promptFile), {
            id: entry.id,
            model: config.imageModel,
            aspectRatio: config.aspectRatio,
            imageSize: config.imageSize,
            referenceImages: references.map((image) => image.fileName),
            prompt
          });

          const { image, model } = await generateWithFallback(
            {
              id: entry.id,
              prompt,
              referenceImages: references,
              aspectRatio: config.aspectRatio,
              imageSize: config.imageSize
            },
            { models, label: `${kind}:${entry.id}`, config, deps, pacer }
          );

          const file = `${entry.id}.${EXTENSION_BY_MIME[image.mimeType] ?? 'png'}`;
          await writeFileAtomic(path.join(outputDir, file), image.data);
          logger.info({ id: entry.id, file, model }, 'Image saved');
          return { id: entry.id, status: 'succeeded', file, promptFile, model };
        } catch (error) {
          const message = errorMessage(error);
          logger.error({ id: entry.id, error: message }, 'Image generation failed');
          return { id: entry.id, status: 'failed', error: message };
        }
      })
    )
  );

  const report: MaterializeReport = {
    kind,
    sourceArtifact: store.pathFor(sourceStage),
    outputDir,
    referenceImages: references.map((image) => image.fileName),
    generatedAt: nowIso(),
    succeeded: results.filter((result) => result.status === 'succeeded').length,
    skipped: results.filter((result) => result.status === 'skipped').length,
    failed: results.filter((result) => result.status === 'failed').length,
    entries: results
  };

  await writeJsonAtomic(path.join(outputDir, MANIFEST_FILE), report);
  return report;
}
