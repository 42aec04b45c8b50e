import { z } from 'zod';

// Stage kinds
export const CREATIVE_STAGES = ['carousel', 'image-prompts', 'video-scripts', 'thumbnail-prompts'] as const;

export const StageKindSchema = z.enum(['research', 'carousel', 'image-prompts', 'video-scripts', 'thumbnail-prompts']);

export type StageKind = z.infer<typeof StageKindSchema>;
export type CreativeStage = (typeof CREATIVE_STAGES)[number];

export const isCreativeStage = (stage: StageKind): stage is CreativeStage => stage !== 'research';

// Product input
export const ProductSchema = z.object({
  name: z.string().trim().min(1, 'Product name cannot be empty'),
  description: z.string().trim().min(1, 'Product description cannot be empty'),
  price: z.string().trim().min(1).optional(),
  warranty: z.string().trim().min(1).optional()
});

export type Product = z.infer<typeof ProductSchema>;

// Research profile
const nonEmptyStrings = (label: string) => z.array(z.string().min(1)).min(1, `At least one ${label} required`);

export const ResearchProfileSchema = z
  .object({
    pains: nonEmptyStrings('pain'),
    desires: nonEmptyStrings('desire'),
    angles: nonEmptyStrings('angle'),
    demographics: z.record(z.unknown()).optional(),
    hooks: z.array(z.string()).optional()
  })
  .passthrough();

export type ResearchProfile = z.infer<typeof ResearchProfileSchema>;

// Creative artifacts
export const AidaStageSchema = z.enum(['attention', 'interest', 'desire', 'action']);

export const CarouselSpecSchema = z.object({
  carousels: z
    .array(
      z.object({
        id: z.string().min(1),
        angle: z.string().min(1),
        adCopy: z.object({
          title: z.string().min(1),
          primaryText: z.string().min(1),
          description: z.string()
        }),
        cards: z
          .array(
            z.object({
              index: z.number().int().min(1),
              stage: AidaStageSchema,
              headline: z.string().min(1),
              body: z.string(),
              imagePrompt: z.string().min(1)
            })
          )
          .min(2, 'A carousel needs at least two cards')
          .max(5, 'A carousel has at most five cards')
      })
    )
    .min(1, 'At least one carousel required')
});

export type CarouselSpec = z.infer<typeof CarouselSpecSchema>;

const AspectRatioSchema = z.string().regex(/^\d+:\d+$/, 'Aspect ratio must look like 1:1').default('1:1');

export const ImagePromptSetSchema = z.object({
  prompts: z
    .array(
      z.object({
        id: z.string().min(1),
        angle: z.string().min(1),
        prompt: z.string().min(1),
        textOverlays: z.array(z.string()).default([]),
        negativePrompt: z.string().optional(),
        aspectRatio: AspectRatioSchema
      })
    )
    .min(1, 'At least one image prompt required')
});

export type ImagePromptSet = z.infer<typeof ImagePromptSetSchema>;

export const VideoScriptSetSchema = z.object({
  scripts: z
    .array(
      z.object({
        id: z.string().min(1),
        angle: z.string().min(1),
        hook: z.string().min(1),
        durationSeconds: z.number().positive(),
        beats: z
          .array(
            z.object({
              timestamp: z.string().min(1),
              visual: z.string().min(1),
              voiceover: z.string(),
              onScreenText: z.string().optional()
            })
          )
          .min(1, 'A script needs at least one beat'),
        callToAction: z.string().min(1)
      })
    )
    .min(1, 'At least one video script required')
});

export type VideoScriptSet = z.infer<typeof VideoScriptSetSchema>;

export const ThumbnailPromptSetSchema = z.object({
  thumbnails: z
    .array(
      z.object({
        id: z.string().min(1),
        angle: z.string().min(1),
        headline: z.string().min(1),
        prompt: z.string().min(1),
        textOverlays: z.array(z.string()).default([]),
        aspectRatio: AspectRatioSchema
      })
    )
    .min(1, 'At least one thumbnail prompt required')
});

export type ThumbnailPromptSet = z.infer<typeof ThumbnailPromptSetSchema>;

export const STAGE_SCHEMAS = {
  research: ResearchProfileSchema,
  carousel: CarouselSpecSchema,
  'image-prompts': ImagePromptSetSchema,
  'video-scripts': VideoScriptSetSchema,
  'thumbnail-prompts': ThumbnailPromptSetSchema
} as const;

export type StageArtifact<S extends StageKind> = z.infer<(typeof STAGE_SCHEMAS)[S]>;

// Run results
export type StageStatus = 'succeeded' | 'skipped' | 'failed';

/** Error recorded for work that was still queued when the run was interrupted. */
export const CANCELLED = 'Cancelled before start';

export interface StageResult {
  stage: StageKind;
  status: StageStatus;
  artifactPath: string;
  error?: string;
}

export interface PipelineReport {
  product: string;
  productDir: string;
  startedAt: string;
  finishedAt: string;
  stages: StageResult[];
}

export type AssetKind = 'images' | 'thumbnails' | 'carousel';

export interface AssetEntryResult {
  id: string;
  status: StageStatus;
  file?: string;
  promptFile?: string;
  /** Model that produced the image, which may be a fallback. */
  model?: string;
  error?: string;
}

export interface MaterializeReport {
  kind: AssetKind;
  sourceArtifact: string;
  outputDir: string;
  referenceImages: string[];
  generatedAt: string;
  succeeded: number;
  skipped: number;
  failed: number;
  entries: AssetEntryResult[];
}
