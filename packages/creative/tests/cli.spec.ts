import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetEnvCacheForTesting } from '@adforge/shared/env';
import { logger, setLogLevel } from '@adforge/shared/logger';
import { buildProgram } from '../src/cli.js';
import { makeTmpDir } from './helpers.js';

describe('adforge CLI', () => {
  let outputRoot: string;

  beforeEach(async () => {
    outputRoot = await makeTmpDir();
    resetEnvCacheForTesting();
    delete process.env.OPENAI_API_KEY;
    delete process.env.GEMINI_API_KEY;
    delete process.env.LOG_LEVEL;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetEnvCacheForTesting();
    delete process.env.LOG_LEVEL;
    setLogLevel('silent');
    process.exitCode = undefined;
    await fs.remove(outputRoot);
  });

  const run = (...args: string[]) =>
    buildProgram().parseAsync([
      'node',
      'adforge',
      ...args,
      '--image-rpm',
      '0',
      '--output-dir',
      outputRoot,
      '--env-file',
      '/nonexistent/.env'
    ]);

  it('runs the whole pipeline offline with mock providers', async () => {
    await run('run', '-n', 'Test Lamp', '-d', 'A desk lamp', '--provider', 'mock', '--image-provider', 'mock');

    const productDir = path.join(outputRoot, 'test_lamp');
    expect(process.exitCode).toBeUndefined();
    expect(await fs.pathExists(path.join(productDir, 'run_report.json'))).toBe(true);
    expect(await fs.pathExists(path.join(productDir, 'generated_images', 'image_1.png'))).toBe(true);
    expect(await fs.pathExists(path.join(productDir, 'generated_thumbnails', 'thumb_1.png'))).toBe(true);
    expect(await fs.pathExists(path.join(productDir, 'generated_carousels'))).toBe(false);
  });

  it('runs a single stage', async () => {
    await run('stage', 'carousel', '-n', 'Test Lamp', '-d', 'A desk lamp', '--provider', 'mock');

    const productDir = path.join(outputRoot, 'test_lamp');
    expect(await fs.pathExists(path.join(productDir, 'market_research_min.json'))).toBe(true);
    expect(await fs.pathExists(path.join(productDir, 'carousel.json'))).toBe(true);
    expect(await fs.pathExists(path.join(productDir, 'video_scripts.json'))).toBe(false);
  });

  it('exits with 1 when credentials are missing', async () => {
    await run('stage', 'research', '-n', 'Test Lamp', '-d', 'A desk lamp', '--provider', 'openai');

    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith('❌ Error: Missing credentials: OPENAI_API_KEY');
    expect(await fs.pathExists(path.join(outputRoot, 'test_lamp'))).toBe(false);
  });

  it('rejects an unknown stage', async () => {
    await run('stage', 'banner', '-n', 'Test Lamp', '-d', 'A desk lamp', '--provider', 'mock');

    expect(process.exitCode).toBe(1);
  });

  it('fails render when the prompt artifact does not exist', async () => {
    await run('render', 'images', '-n', 'Test Lamp', '-d', 'A desk lamp', '--image-provider', 'mock');

    expect(process.exitCode).toBe(1);
  });

  it('applies LOG_LEVEL from the env file to existing loggers', async () => {
    const envFile = path.join(outputRoot, '.env');
    await fs.outputFile(envFile, 'LOG_LEVEL=error\n');

    await buildProgram().parseAsync([
      'node',
      'adforge',
      'stage',
      'research',
      '-n',
      'Test Lamp',
      '-d',
      'A desk lamp',
      '--provider',
      'mock',
      '--output-dir',
      outputRoot,
      '--env-file',
      envFile
    ]);

    expect(process.exitCode).toBeUndefined();
    expect(logger.level).toBe('error');
  });

  it('prints the image fallback chain', async () => {
    await run('stage', 'research', '-n', 'Test Lamp', '-d', 'A desk lamp', '--provider', 'mock', '--image-fallback-model', 'model-b', 'model-c');

    expect(console.log).toHaveBeenCalledWith('🔁 Image fallbacks: model-b, model-c');
  });
});
