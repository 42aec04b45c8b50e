import type { z, ZodTypeAny } from 'zod';
import { createScopedLogger } from '@adforge/shared/logger';
import { errorMessage } from '@adforge/shared/utils';
import { ArtifactStore } from './artifacts.js';
import type { RunConfig } from './config.js';
import { InvalidModelOutputError, StageFailureError } from './errors.js';
import { parseModelJson } from './promptGuards.js';
import { buildPrompt, SYSTEM_PROMPTS } from './promptTemplates.js';
import type { TextModel } from './providers/base.js';
import { STAGE_SCHEMAS, type ResearchProfile, type StageArtifact, type StageKind, type StageResult } from './types.js';
import { withRetry, type Sleep } from './util/retry.js';

const logger = createScopedLogger('stages');

export interface StageDeps {
  textModel: TextModel;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface StageRun<T> {
  result: StageResult;
  artifact: T;
}

function validate<S extends ZodTypeAny>(schema: S, value: unknown): z.infer<S> | undefined {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Runs one stage end to end: reuse a valid artifact unless forced, otherwise
 * prompt the model (through the retry wrapper), validate and persist.
 * Any failure surfaces as a StageFailureError.
 */
export async function executeStage<S extends StageKind>(
  stage: S,
  config: RunConfig,
  deps: StageDeps,
  research?: ResearchProfile
): Promise<StageRun<StageArtifact<S>>> {
  const store = new ArtifactStore(config.productDir);
  const artifactPath = store.pathFor(stage);
  const schema = STAGE_SCHEMAS[stage];

  try {
    if (!config.force) {
      const existing = await store.read(stage);
      if (existing !== undefined) {
        const artifact = validate(schema, existing);
        if (artifact !== undefined) {
          logger.info({ stage, artifactPath }, 'Artifact exists, skipping stage');
          return { result: { stage, status: 'skipped', artifactPath }, artifact };
        }
        logger.warn({ stage, artifactPath }, 'Existing artifact is invalid, regenerating');
      }
    }

    const prompt = buildPrompt(stage, {
      product: config.product,
      research,
      angleCount: config.angleCount
    });

    logger.info({ stage, provider: deps.textModel.name, model: config.textModel }, 'Running stage');
    const raw = await withRetry(
      () =>
        deps.textModel.generate({
          stage,
          system: SYSTEM_PROMPTS[stage],
          prompt,
          model: config.textModel
        }),
      { policy: config.backoff, label: stage, sleep: deps.sleep, signal: deps.signal }
    );

    let artifact: StageArtifact<S>;
    try {
      artifact = parseModelJson(raw, schema);
    } catch (error) {
      if (!(error instanceof InvalidModelOutputError)) throw error;
      const rawPath = await store.dumpRaw(stage, raw);
      logger.error({ stage, rawPath, error: error.message }, 'Model output rejected, raw text saved');
      throw new InvalidModelOutputError(`${error.message} (raw output saved to ${rawPath})`, rawPath);
    }

    await store.write(stage, artifact);
    logger.info({ stage, artifactPath }, 'Stage completed');
    return { result: { stage, status: 'succeeded', artifactPath }, artifact };
  } catch (error) {
    if (error instanceof StageFailureError) throw error;
    throw new StageFailureError(stage, error instanceof Error ? error : new Error(errorMessage(error)));
  }
}
