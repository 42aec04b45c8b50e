import path from 'node:path';
import fs from 'fs-extra';
import { slugify } from '@adforge/shared/utils';
import { InputError } from './errors.js';
import type { AssetKind, StageKind } from './types.js';

export const ARTIFACT_FILES: Record<StageKind, string> = {
  research: 'market_research_min.json',
  carousel: 'carousel.json',
  'image-prompts': 'image_prompts.json',
  'video-scripts': 'video_scripts.json',
  'thumbnail-prompts': 'thumbnail_prompts.json'
};

export const RUN_REPORT_FILE = 'run_report.json';
export const MANIFEST_FILE = 'manifest.json';
export const REFERENCE_IMAGES_DIR = 'product_images';

export const ASSET_DIRS: Record<AssetKind, string> = {
  images: 'generated_images',
  thumbnails: 'generated_thumbnails',
  carousel: 'generated_carousels'
};

/** Every file for a product lives under `<outputRoot>/<slug(name)>/`. */
export function resolveProductDir(outputRoot: string, productName: string): string {
  const slug = slugify(productName);
  if (!slug) {
    throw new InputError(`Product name "${productName}" has no usable characters for a directory name`);
  }
  return path.resolve(outputRoot, slug);
}

let tmpCounter = 0;

/**
 * Writes JSON through a sibling temp file and a rename so readers never see a
 * half-written artifact.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  await fs.outputJson(tmpPath, data, { spaces: 2 });
  await fs.move(tmpPath, filePath, { overwrite: true });
}

export async function writeFileAtomic(filePath: string, data: Buffer | string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  await fs.outputFile(tmpPath, data);
  await fs.move(tmpPath, filePath, { overwrite: true });
}

export class ArtifactStore {
  constructor(readonly productDir: string) {}

  pathFor(stage: StageKind): string {
    return path.join(this.productDir, ARTIFACT_FILES[stage]);
  }

  rawDumpPath(stage: StageKind): string {
    return path.join(this.productDir, `${stage}.raw.txt`);
  }

  exists(stage: StageKind): Promise<boolean> {
    return fs.pathExists(this.pathFor(stage));
  }

  /** Returns the parsed artifact, or undefined when the file is missing or not JSON. */
  async read(stage: StageKind): Promise<unknown> {
    if (!(await this.exists(stage))) return undefined;
    const text = await fs.readFile(this.pathFor(stage), 'utf8');
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      return undefined;
    }
  }

  async write(stage: StageKind, data: unknown): Promise<string> {
    const file = this.pathFor(stage);
    await writeJsonAtomic(file, data);
    return file;
  }

  async dumpRaw(stage: StageKind, raw: string): Promise<string> {
    const file = this.rawDumpPath(stage);
    await fs.outputFile(file, raw, 'utf8');
    return file;
  }
}
