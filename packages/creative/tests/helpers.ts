import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import type { AppEnv } from '@adforge/shared/env';
import { createRunConfig, type RunConfig, type RunConfigInput } from '../src/config.js';
import {
  success,
  type GeneratedImage,
  type ImageModel,
  type ImageRequest,
  type ModelOutcome,
  type TextModel,
  type TextRequest
} from '../src/providers/base.js';
import type { StageKind } from '../src/types.js';

export const makeTmpDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'adforge-'));

export const testEnv = (overrides: Partial<AppEnv> = {}): AppEnv => ({
  NODE_ENV: 'test',
  OPENAI_API_KEY: 'test-secret',
  GEMINI_API_KEY: 'test-secret',
  TEXT_PROVIDER: 'mock',
  IMAGE_PROVIDER: 'mock',
  IMAGE_MODEL: 'test-image-model',
  IMAGE_FALLBACK_MODELS: [],
  IMAGE_RPM: 0,
  OUTPUT_ROOT: 'output',
  CONCURRENCY: 2,
  RETRY_STRATEGY: 'fixed',
  RETRY_BASE_DELAY_MS: 10,
  RETRY_MAX_DELAY_MS: 100,
  RETRY_MAX_ATTEMPTS: 3,
  ...overrides
});

export const testConfig = (outputRoot: string, input: Partial<RunConfigInput> = {}): RunConfig =>
  createRunConfig(
    {
      product: { name: 'bee_venom_bswell', description: 'Bee venom cream for knees and hands' },
      outputRoot,
      ...input
    },
    testEnv()
  );

export const RESEARCH_FIXTURE = {
  pains: ['joint pain after walking', 'stiff hands in the morning'],
  desires: ['garden without aches', 'avoid daily pills'],
  angles: ['Morning stiffness', 'Natural ingredient', 'Active retirement'],
  demographics: { age: '50-75' }
};

export const ARTIFACT_FIXTURES: Record<StageKind, unknown> = {
  research: RESEARCH_FIXTURE,
  carousel: {
    carousels: [
      {
        id: 'carousel_1',
        angle: 'Morning stiffness',
        adCopy: { title: 'Loosen up', primaryText: 'Stiff hands at 7am?', description: 'Try it today' },
        cards: [
          { index: 1, stage: 'attention', headline: 'Stiff hands?', body: 'Every morning.', imagePrompt: 'Hands around a mug' },
          { index: 2, stage: 'action', headline: 'Order now', body: 'Ships today.', imagePrompt: 'Jar on a table' }
        ]
      }
    ]
  },
  'image-prompts': {
    prompts: [{ id: 'image_1', angle: 'Natural ingredient', prompt: 'Jar next to a honeycomb', textOverlays: ['Pure'] }]
  },
  'video-scripts': {
    scripts: [
      {
        id: 'video_1',
        angle: 'Active retirement',
        hook: 'Still gardening at 70?',
        durationSeconds: 30,
        beats: [{ timestamp: '0-3s', visual: 'Garden', voiceover: 'Still gardening at 70?' }],
        callToAction: 'Order yours'
      }
    ]
  },
  'thumbnail-prompts': {
    thumbnails: [{ id: 'thumb_1', angle: 'Morning stiffness', headline: 'Stiff hands?', prompt: 'Close-up of hands', textOverlays: [] }]
  }
};

type TextResponder = (request: TextRequest, call: number) => ModelOutcome<string> | Promise<ModelOutcome<string>>;

/** Answers each stage with its fixture unless a responder overrides that stage. */
export class FakeTextModel implements TextModel {
  readonly name = 'fake';
  readonly calls: TextRequest[] = [];

  constructor(private readonly responders: Partial<Record<StageKind, TextResponder>> = {}) {}

  callsFor(stage: StageKind): TextRequest[] {
    return this.calls.filter((call) => call.stage === stage);
  }

  async generate(request: TextRequest): Promise<ModelOutcome<string>> {
    this.calls.push(request);
    const responder = this.responders[request.stage];
    if (responder) {
      return responder(request, this.callsFor(request.stage).length);
    }
    return success(JSON.stringify(ARTIFACT_FIXTURES[request.stage]));
  }
}

type ImageResponder = (request: ImageRequest) => ModelOutcome<GeneratedImage>;

export class FakeImageModel implements ImageModel {
  readonly name = 'fake';
  readonly calls: ImageRequest[] = [];

  constructor(private readonly responder?: ImageResponder) {}

  async generate(request: ImageRequest): Promise<ModelOutcome<GeneratedImage>> {
    this.calls.push(request);
    if (this.responder) return this.responder(request);
    return success({ data: Buffer.from(`image:${request.id}`), mimeType: 'image/png' });
  }
}
