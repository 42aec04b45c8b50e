import path from 'node:path';
import pLimit from 'p-limit';
import { createScopedLogger } from '@adforge/shared/logger';
import { nowIso } from '@adforge/shared/utils';
import { ArtifactStore, RUN_REPORT_FILE, writeJsonAtomic } from './artifacts.js';
import type { RunConfig } from './config.js';
import { StageFailureError } from './errors.js';
import { executeStage, type StageDeps } from './stages.js';
import {
  CANCELLED,
  CREATIVE_STAGES,
  isCreativeStage,
  type CreativeStage,
  type PipelineReport,
  type ResearchProfile,
  type StageKind,
  type StageResult
} from './types.js';

const logger = createScopedLogger('pipeline');

export type PipelineDeps = StageDeps;

async function runCreativeStage(
  stage: CreativeStage,
  config: RunConfig,
  deps: PipelineDeps,
  research: ResearchProfile
): Promise<StageResult> {
  const artifactPath = new ArtifactStore(config.productDir).pathFor(stage);
  if (deps.signal?.aborted) {
    logger.warn({ stage }, 'Run cancelled, stage not started');
    return { stage, status: 'failed', artifactPath, error: CANCELLED };
  }

  try {
    const { result } = await executeStage(stage, config, deps, research);
    return result;
  } catch (error) {
    if (!(error instanceof StageFailureError)) throw error;
    logger.error({ stage, error: error.reason.message }, 'Creative stage failed');
    return {
      stage,
      status: 'failed',
      artifactPath,
      error: error.reason.message
    };
  }
}

/**
 * Research first, then the four creative stages under the concurrency bound.
 * A creative failure is recorded and does not stop its siblings; a research
 * failure rejects with StageFailureError.
 */
export async function runPipeline(config: RunConfig, deps: PipelineDeps): Promise<PipelineReport> {
  const startedAt = nowIso();
  logger.info({ product: config.product.name, productDir: config.productDir }, 'Starting pipeline');

  const research = await executeStage('research', config, deps);

  const limit = pLimit(config.concurrency);
  const creative = await Promise.all(
    CREATIVE_STAGES.map((stage) => limit(() => runCreativeStage(stage, config, deps, research.artifact)))
  );

  const report: PipelineReport = {
    product: config.product.name,
    productDir: config.productDir,
    startedAt,
    finishedAt: nowIso(),
    stages: [research.result, ...creative]
  };

  await writeJsonAtomic(path.join(config.productDir, RUN_REPORT_FILE), report);

  const failed = creative.filter((result) => result.status === 'failed').length;
  logger.info({ failed, total: report.stages.length }, 'Pipeline finished');
  return report;
}

/** Ensures the research artifact exists (running it if needed), then runs one stage. */
export async function runSingleStage(stage: StageKind, config: RunConfig, deps: PipelineDeps): Promise<PipelineReport> {
  const startedAt = nowIso();
  const research = await executeStage('research', config, deps);
  const stages: StageResult[] = [research.result];

  if (isCreativeStage(stage)) {
    stages.push(await runCreativeStage(stage, config, deps, research.artifact));
  }

  return {
    product: config.product.name,
    productDir: config.productDir,
    startedAt,
    finishedAt: nowIso(),
    stages
  };
}

export const hasFailures = (report: PipelineReport) => report.stages.some((stage) => stage.status === 'failed');
