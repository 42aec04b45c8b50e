import { createScopedLogger } from '@adforge/shared/logger';
import { errorMessage } from '@adforge/shared/utils';
import type { ImageModel, TextModel } from './base.js';
import { GeminiImageModel } from './geminiImageProvider.js';
import { GeminiTextModel } from './geminiProvider.js';
import { MockImageModel, MockTextModel } from './mockProvider.js';
import { OpenAITextModel } from './openaiProvider.js';

export * from './base.js';

const logger = createScopedLogger('providers');

export type TextProviderName = 'openai' | 'gemini' | 'mock';
export type ImageProviderName = 'gemini' | 'mock';

export interface ProviderKeys {
  openaiApiKey?: string;
  geminiApiKey?: string;
}

export function getTextModel(name: TextProviderName, keys: ProviderKeys, model?: string): TextModel {
  try {
    switch (name) {
      case 'openai':
        return new OpenAITextModel(keys.openaiApiKey, model);
      case 'gemini':
        return new GeminiTextModel(keys.geminiApiKey, model);
      case 'mock':
        return new MockTextModel();
    }
  } catch (error) {
    logger.error({ error: errorMessage(error), provider: name }, 'Failed to initialize text provider');
    throw error;
  }
}

export function getImageModel(name: ImageProviderName, keys: ProviderKeys, model?: string): ImageModel {
  try {
    switch (name) {
      case 'gemini':
        return new GeminiImageModel(keys.geminiApiKey, model);
      case 'mock':
        return new MockImageModel();
    }
  } catch (error) {
    logger.error({ error: errorMessage(error), provider: name }, 'Failed to initialize image provider');
    throw error;
  }
}
