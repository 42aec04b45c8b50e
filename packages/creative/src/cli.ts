import { Command, InvalidArgumentError } from 'commander';
import { loadEnv } from '@adforge/shared/env';
import { createScopedLogger, setLogLevel } from '@adforge/shared/logger';
import { errorMessage } from '@adforge/shared/utils';
import { assertCredentials, createRunConfig, loadProductFile, type RunConfig } from './config.js';
import { materializeAssets, SOURCE_STAGES } from './materializer.js';
import { intervalFromRpm, RequestPacer } from './util/pacer.js';
import { hasFailures, runPipeline, runSingleStage } from './pipeline.js';
import { getImageModel, getTextModel } from './providers/index.js';
import { printMaterializeReport, printPipelineReport } from './report.js';
import { StageKindSchema, type AssetKind, type PipelineReport } from './types.js';

const logger = createScopedLogger('cli');

interface CliOptions {
  productName?: string;
  productDescription?: string;
  productPrice?: string;
  productWarranty?: string;
  productFile?: string;
  outputDir?: string;
  provider?: string;
  model?: string;
  imageProvider?: string;
  imageModel?: string;
  imageFallbackModel?: string[];
  imageRpm?: number;
  imageSize?: string;
  angles?: number;
  maxReferenceImages?: number;
  concurrency?: number;
  backoff?: string;
  retryDelay?: number;
  maxRetryDelay?: number;
  maxAttempts?: number;
  force?: boolean;
  skipAssets?: boolean;
  withCarouselImages?: boolean;
  envFile?: string;
}

const ASSET_KINDS: readonly AssetKind[] = ['images', 'thumbnails', 'carousel'];

const isAssetKind = (value: string): value is AssetKind => ASSET_KINDS.some((kind) => kind === value);

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-n, --product-name <name>', 'Product name')
    .option('-d, --product-description <text>', 'Product description')
    .option('--product-price <price>', 'Price shown to the research stage')
    .option('--product-warranty <text>', 'Warranty or guarantee')
    .option('-f, --product-file <path>', 'YAML or JSON file with name, description, price, warranty')
    .option('-o, --output-dir <path>', 'Root directory for product outputs (default: OUTPUT_ROOT or "output")')
    .option('--provider <provider>', 'Text provider (openai|gemini|mock)')
    .option('--model <model>', 'Text model to use')
    .option('--image-provider <provider>', 'Image provider (gemini|mock)')
    .option('--image-model <model>', 'Image model to use')
    .option('--image-fallback-model <models...>', 'Models tried in order when the image model fails')
    .option('--image-rpm <number>', 'Image requests per minute (0 disables pacing)', parseInteger)
    .option('--image-size <size>', 'Image size (1K|2K|4K)')
    .option('--angles <number>', 'Number of marketing angles per creative stage', parseInteger)
    .option('--max-reference-images <number>', 'Reference photos sent with each image request', parseInteger)
    .option('--concurrency <number>', 'Concurrent model requests', parseInteger)
    .option('--backoff <strategy>', 'Backoff strategy for rate limits (fixed|exponential)')
    .option('--retry-delay <ms>', 'Base delay between rate-limited attempts', parseInteger)
    .option('--max-retry-delay <ms>', 'Upper bound for a single wait', parseInteger)
    .option('--max-attempts <number>', 'Attempts per model call before giving up', parseInteger)
    .option('--force', 'Regenerate artifacts and images that already exist', false)
    .option('--env-file <path>', 'Load environment variables from this file');
}

async function resolveConfig(options: CliOptions): Promise<RunConfig> {
  const env = loadEnv({ path: options.envFile });
  if (env.LOG_LEVEL) setLogLevel(env.LOG_LEVEL);
  const fromFile = options.productFile ? await loadProductFile(options.productFile) : {};

  return createRunConfig(
    {
      product: {
        ...fromFile,
        ...(options.productName !== undefined && { name: options.productName }),
        ...(options.productDescription !== undefined && { description: options.productDescription }),
        ...(options.productPrice !== undefined && { price: options.productPrice }),
        ...(options.productWarranty !== undefined && { warranty: options.productWarranty })
      },
      outputRoot: options.outputDir,
      textProvider: options.provider,
      textModel: options.model,
      imageProvider: options.imageProvider,
      imageModel: options.imageModel,
      imageFallbackModels: options.imageFallbackModel,
      imageRpm: options.imageRpm,
      imageSize: options.imageSize,
      angleCount: options.angles,
      maxReferenceImages: options.maxReferenceImages,
      concurrency: options.concurrency,
      backoff: options.backoff,
      retryDelayMs: options.retryDelay,
      maxRetryDelayMs: options.maxRetryDelay,
      maxAttempts: options.maxAttempts,
      force: options.force
    },
    env
  );
}

function printHeader(config: RunConfig): void {
  console.log(`🚀 Product: ${config.product.name}`);
  console.log(`📁 Output: ${config.productDir}`);
  console.log(`🤖 Text provider: ${config.textProvider}${config.textModel ? ` (${config.textModel})` : ''}`);
  console.log(`🎨 Image provider: ${config.imageProvider} (${config.imageModel}, ${config.imageSize})`);
  if (config.imageFallbackModels.length > 0) {
    console.log(`🔁 Image fallbacks: ${config.imageFallbackModels.join(', ')}`);
  }
  console.log(
    `⏳ Backoff: ${config.backoff.strategy}, ${config.backoff.baseDelayMs}ms base, ${config.backoff.maxAttempts} attempts`
  );
}

/** Cancels in-flight waits on Ctrl+C; finished artifacts stay on disk for the next run. */
async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = () => {
    console.error('\n⚠️  Interrupted, stopping after in-flight requests');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function renderAssets(kinds: AssetKind[], config: RunConfig, signal: AbortSignal, report?: PipelineReport) {
  const imageModel = getImageModel(config.imageProvider, config.keys, config.imageModel);
  const pacer = new RequestPacer(intervalFromRpm(config.imageRpm));
  for (const kind of kinds) {
    const source = report?.stages.find((stage) => stage.stage === SOURCE_STAGES[kind]);
    if (source?.status === 'failed') {
      console.log(`\n⏭️  Skipping ${kind}: ${source.stage} failed`);
      continue;
    }
    const result = await materializeAssets(kind, config, { imageModel, signal, pacer });
    printMaterializeReport(result);
  }
}

const fail = (error: unknown) => {
  const message = errorMessage(error);
  logger.error({ error: message }, 'CLI command failed');
  console.error(`❌ Error: ${message}`);
  process.exitCode = 1;
};

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('adforge')
    .description('Research a product and generate ad creatives and images with LLMs')
    .version('0.1.0');

  withCommonOptions(
    program
      .command('run')
      .description('Run research, the four creative stages and image rendering')
      .option('--skip-assets', 'Stop after the text stages', false)
      .option('--with-carousel-images', 'Also render one image per carousel card', false)
  ).action(async (options: CliOptions) => {
    try {
      const config = await resolveConfig(options);
      assertCredentials(config, { text: true, images: !options.skipAssets });
      printHeader(config);

      await withInterrupt(async (signal) => {
        const textModel = getTextModel(config.textProvider, config.keys, config.textModel);
        const report = await runPipeline(config, { textModel, signal });
        printPipelineReport(report);

        if (!options.skipAssets) {
          const kinds: AssetKind[] = options.withCarouselImages
            ? ['images', 'thumbnails', 'carousel']
            : ['images', 'thumbnails'];
          await renderAssets(kinds, config, signal, report);
        }

        if (hasFailures(report)) {
          process.exitCode = 1;
        } else {
          console.log('\n🎉 All stages completed');
        }
      });
    } catch (error) {
      fail(error);
    }
  });

  withCommonOptions(
    program
      .command('stage')
      .description('Run one stage (research runs first if its artifact is missing)')
      .argument('<stage>', 'research|carousel|image-prompts|video-scripts|thumbnail-prompts')
  ).action(async (stageName: string, options: CliOptions) => {
    try {
      const stage = StageKindSchema.safeParse(stageName);
      if (!stage.success) {
        throw new InvalidArgumentError(`Unknown stage "${stageName}". Use one of: ${StageKindSchema.options.join(', ')}`);
      }
      const config = await resolveConfig(options);
      assertCredentials(config, { text: true, images: false });
      printHeader(config);

      await withInterrupt(async (signal) => {
        const textModel = getTextModel(config.textProvider, config.keys, config.textModel);
        const report = await runSingleStage(stage.data, config, { textModel, signal });
        printPipelineReport(report);
        if (hasFailures(report)) process.exitCode = 1;
      });
    } catch (error) {
      fail(error);
    }
  });

  withCommonOptions(
    program
      .command('render')
      .description('Generate images from an existing prompt artifact')
      .argument('<kind>', 'images|thumbnails|carousel')
  ).action(async (kind: string, options: CliOptions) => {
    try {
      if (!isAssetKind(kind)) {
        throw new InvalidArgumentError(`Unknown asset kind "${kind}". Use one of: ${ASSET_KINDS.join(', ')}`);
      }
      const config = await resolveConfig(options);
      assertCredentials(config, { text: false, images: true });
      printHeader(config);

      await withInterrupt((signal) => renderAssets([kind], config, signal));
    } catch (error) {
      fail(error);
    }
  });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    console.error('❌ Unhandled promise rejection:', reason);
    process.exitCode = 1;
  });

  await buildProgram().parseAsync(argv);
}
