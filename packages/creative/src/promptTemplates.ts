import { InputError } from './errors.js';
import {
  ProductSchema,
  ResearchProfileSchema,
  type Product,
  type ResearchProfile,
  type StageKind
} from './types.js';

export interface PromptInputs {
  product: Product;
  research?: ResearchProfile;
  angleCount?: number;
}

export const DEFAULT_ANGLE_COUNT = 3;

export const SYSTEM_PROMPTS: Record<StageKind, string> = {
  research:
    'You are a direct-response market researcher. You study a product and describe who buys it and why. Respond with a single JSON object and nothing else.',
  carousel:
    'You are a performance copywriter who builds AIDA carousel ads for Meta placements. Respond with a single JSON object and nothing else.',
  'image-prompts':
    'You are an art director writing prompts for a photorealistic product image model. Respond with a single JSON object and nothing else.',
  'video-scripts':
    'You are a short-form video ad scriptwriter for Reels and TikTok. Respond with a single JSON object and nothing else.',
  'thumbnail-prompts':
    'You are a designer of scroll-stopping video thumbnails. Respond with a single JSON object and nothing else.'
};

const RESPONSE_SHAPES: Record<StageKind, string> = {
  research: `{
  "pains": ["..."],
  "desires": ["..."],
  "angles": ["..."],
  "demographics": { "age": "...", "gender": "...", "location": "...", "income": "..." },
  "hooks": ["..."]
}`,
  carousel: `{
  "carousels": [
    {
      "id": "carousel_1",
      "angle": "...",
      "adCopy": { "title": "...", "primaryText": "...", "description": "..." },
      "cards": [
        { "index": 1, "stage": "attention|interest|desire|action", "headline": "...", "body": "...", "imagePrompt": "..." }
      ]
    }
  ]
}`,
  'image-prompts': `{
  "prompts": [
    { "id": "image_1", "angle": "...", "prompt": "...", "textOverlays": ["..."], "negativePrompt": "...", "aspectRatio": "1:1" }
  ]
}`,
  'video-scripts': `{
  "scripts": [
    {
      "id": "video_1",
      "angle": "...",
      "hook": "...",
      "durationSeconds": 30,
      "beats": [ { "timestamp": "0-3s", "visual": "...", "voiceover": "...", "onScreenText": "..." } ],
      "callToAction": "..."
    }
  ]
}`,
  'thumbnail-prompts': `{
  "thumbnails": [
    { "id": "thumb_1", "angle": "...", "headline": "...", "prompt": "...", "textOverlays": ["..."], "aspectRatio": "1:1" }
  ]
}`
};

const bullets = (items: string[]) => items.map((item) => `- ${item}`).join('\n');

function productBlock(product: Product): string {
  const lines = [`Product name: ${product.name}`, `Product description: ${product.description}`];
  if (product.price) lines.push(`Price: ${product.price}`);
  if (product.warranty) lines.push(`Warranty: ${product.warranty}`);
  return lines.join('\n');
}

function researchBlock(research: ResearchProfile, angleCount: number): string {
  const angles = research.angles.slice(0, angleCount);
  return `Market research (the only source of facts you may use):
${JSON.stringify(research, null, 2)}

Customer pains:
${bullets(research.pains)}

Customer desires:
${bullets(research.desires)}

Angles to cover (${angles.length}):
${angles.map((angle, index) => `${index + 1}. ${angle}`).join('\n')}`;
}

function validateProduct(product: Product): Product {
  const parsed = ProductSchema.safeParse(product);
  if (!parsed.success) {
    throw new InputError(`Invalid product: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
  }
  return product;
}

function requireResearch(stage: StageKind, research: ResearchProfile | undefined): ResearchProfile {
  if (!research) {
    throw new InputError(`Stage ${stage} needs a research profile`);
  }
  const parsed = ResearchProfileSchema.safeParse(research);
  if (!parsed.success) {
    throw new InputError(`Stage ${stage} got an invalid research profile: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

const STAGE_INSTRUCTIONS: Record<Exclude<StageKind, 'research'>, (angleCount: number) => string> = {
  carousel: (angleCount) => `Write ${angleCount} carousel ads, one per angle above.
Each carousel follows AIDA across 4 cards (attention, interest, desire, action), one stage per card in that order.
- headline: at most 8 words, benefit first
- body: one or two short sentences
- imagePrompt: a concrete photographic scene showing the real product, no invented packaging
- adCopy.primaryText opens with a pain from the research and closes with the call to action`,
  'image-prompts': (angleCount) => `Write ${angleCount} single-image ad prompts, one per angle above.
- prompt: subject, setting, lighting, camera angle and mood in one paragraph; the product must appear exactly as in the reference photos
- textOverlays: at most 2 short lines that will be rendered on the image
- negativePrompt: what must not appear (extra products, distorted labels, hands with extra fingers)
- aspectRatio: "1:1"`,
  'video-scripts': (angleCount) => `Write ${angleCount} video ad scripts of 20 to 45 seconds, one per angle above.
- hook: the first line spoken in the first 3 seconds, built on a pain
- beats: ordered scenes with timestamp ranges, what is shown, the voiceover and optional on-screen text
- callToAction: one imperative sentence`,
  'thumbnail-prompts': (angleCount) => `Write ${angleCount} thumbnail prompts, one per angle above.
- headline: 2 to 5 words, readable at phone size
- prompt: one high-contrast scene with the product in the foreground and an expressive face or clear before/after
- textOverlays: the headline plus at most one supporting line
- aspectRatio: "1:1"`
};

/**
 * Builds the user prompt for a stage. Pure: same inputs, same string.
 *
 * Creative stages embed the research profile and may only use facts that trace
 * back to it or to the product itself.
 */
export function buildPrompt(stage: StageKind, inputs: PromptInputs): string {
  const product = validateProduct(inputs.product);
  const angleCount = inputs.angleCount ?? DEFAULT_ANGLE_COUNT;
  if (!Number.isInteger(angleCount) || angleCount < 1) {
    throw new InputError(`angleCount must be a positive integer, got ${angleCount}`);
  }

  if (stage === 'research') {
    return `Research the market for this product.

${productBlock(product)}

List the concrete pains and desires of the people most likely to buy it, describe them demographically,
and propose at least ${angleCount} distinct marketing angles ranked by expected conversion. Include a few
scroll-stopping hooks. Be specific to this product; no generic wellness language.

Respond with JSON in exactly this shape:
${RESPONSE_SHAPES.research}`;
  }

  const research = requireResearch(stage, inputs.research);
  return `${productBlock(product)}

${researchBlock(research, angleCount)}

${STAGE_INSTRUCTIONS[stage](Math.min(angleCount, research.angles.length))}

Do not invent claims, certifications, prices or guarantees that are not in the product details or the research.

Respond with JSON in exactly this shape:
${RESPONSE_SHAPES[stage]}`;
}

export const PRODUCT_LOCK_RULE =
  'CRITICAL: The provided images are the EXACT product reference. Reproduce the product exactly as shown (shape, colors, label, proportions). Do not redesign, restyle or add other products.';

export interface ImagePromptEntry {
  id: string;
  prompt: string;
  textOverlays?: string[];
  negativePrompt?: string;
}

/**
 * Payload sent to the image model for one entry. The aspect ratio is forced so
 * every asset in a set matches regardless of what the text model proposed.
 */
export function buildImagePrompt(entry: ImagePromptEntry, options: { aspectRatio: string; hasReferences: boolean }): string {
  const payload: Record<string, unknown> = {
    task: 'Generate one advertising image.',
    rules: options.hasReferences ? [PRODUCT_LOCK_RULE] : [],
    scene: entry.prompt,
    aspect_ratio: options.aspectRatio
  };
  if (entry.textOverlays && entry.textOverlays.length > 0) {
    payload.text_overlays = entry.textOverlays;
  }
  if (entry.negativePrompt) {
    payload.avoid = entry.negativePrompt;
  }
  return JSON.stringify(payload, null, 2);
}
