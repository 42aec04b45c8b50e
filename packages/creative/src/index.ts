export * from './types.js';
export * from './errors.js';
export * from './artifacts.js';
export * from './config.js';
export * from './promptTemplates.js';
export * from './promptGuards.js';
export * from './providers/index.js';
export * from './util/retry.js';
export * from './util/pacer.js';
export { executeStage, type StageDeps, type StageRun } from './stages.js';
export { runPipeline, runSingleStage, hasFailures, type PipelineDeps } from './pipeline.js';
export {
  collectPromptEntries,
  loadReferenceImages,
  materializeAssets,
  SOURCE_STAGES,
  type MaterializeDeps
} from './materializer.js';
export { buildProgram, runCli } from './cli.js';
