import type { StageKind } from '../types.js';
import { success, type GeneratedImage, type ImageModel, type ImageRequest, type ModelOutcome, type TextModel, type TextRequest } from './base.js';

// 1x1 transparent PNG
const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
  'base64'
);

const CANNED: Record<StageKind, unknown> = {
  research: {
    pains: ['Stiff joints in the morning', 'Pain that interrupts sleep'],
    desires: ['Move freely again', 'Natural relief without pills'],
    angles: ['Morning mobility', 'Natural ingredients', 'Sleep through the night'],
    demographics: { age: '45-70', gender: 'mixed' },
    hooks: ['What if your knees felt ten years younger?']
  },
  carousel: {
    carousels: [
      {
        id: 'carousel_1',
        angle: 'Morning mobility',
        adCopy: {
          title: 'Wake up ready to move',
          primaryText: 'Stiff mornings do not have to be your normal.',
          description: 'Try it risk free'
        },
        cards: [
          { index: 1, stage: 'attention', headline: 'Stiff every morning?', body: 'You are not alone.', imagePrompt: 'Person stretching at sunrise, product on nightstand' },
          { index: 2, stage: 'interest', headline: 'Targets the source', body: 'Apply in seconds.', imagePrompt: 'Close-up of product jar held in hand' },
          { index: 3, stage: 'desire', headline: 'Move freely', body: 'Back to your walks.', imagePrompt: 'Smiling person walking in a park' },
          { index: 4, stage: 'action', headline: 'Order today', body: 'Limited stock.', imagePrompt: 'Product on clean background with call to action' }
        ]
      }
    ]
  },
  'image-prompts': {
    prompts: [
      {
        id: 'image_1',
        angle: 'Natural ingredients',
        prompt: 'Product jar surrounded by honeycomb on a marble counter, soft daylight',
        textOverlays: ['Natural relief'],
        aspectRatio: '1:1'
      }
    ]
  },
  'video-scripts': {
    scripts: [
      {
        id: 'video_1',
        angle: 'Sleep through the night',
        hook: 'Woke up at 3am because of your knees again?',
        durationSeconds: 30,
        beats: [
          { timestamp: '0-3s', visual: 'Person awake in bed holding knee', voiceover: 'Woke up at 3am again?' },
          { timestamp: '3-20s', visual: 'Applying the product', voiceover: 'A few seconds before bed.', onScreenText: 'Apply before sleep' },
          { timestamp: '20-30s', visual: 'Person waking rested', voiceover: 'Sleep through the night.' }
        ],
        callToAction: 'Tap to order yours'
      }
    ]
  },
  'thumbnail-prompts': {
    thumbnails: [
      {
        id: 'thumb_1',
        angle: 'Morning mobility',
        headline: 'Stiff knees?',
        prompt: 'Bold thumbnail, person holding knee, product in foreground, high contrast',
        textOverlays: ['Stiff knees?'],
        aspectRatio: '1:1'
      }
    ]
  }
};

/** Offline text model that answers every stage with a fixed, valid artifact. */
export class MockTextModel implements TextModel {
  readonly name = 'mock';

  async generate(request: TextRequest): Promise<ModelOutcome<string>> {
    return success(JSON.stringify(CANNED[request.stage]));
  }
}

export class MockImageModel implements ImageModel {
  readonly name = 'mock';

  async generate(_request: ImageRequest): Promise<ModelOutcome<GeneratedImage>> {
    return success({ data: PIXEL_PNG, mimeType: 'image/png' });
  }
}
