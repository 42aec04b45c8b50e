import { FinishReason, GoogleGenAI, Modality, type Part } from '@google/genai';
import { createScopedLogger } from '@adforge/shared/logger';
import { AuthError } from '../errors.js';
import {
  classifyError,
  fatal,
  success,
  type GeneratedImage,
  type ImageModel,
  type ImageRequest,
  type ModelOutcome
} from './base.js';

const logger = createScopedLogger('providers.gemini-image');

export const DEFAULT_IMAGE_MODEL = 'gemini-3-pro-image-preview';

export class GeminiImageModel implements ImageModel {
  readonly name = 'gemini';
  private client: GoogleGenAI;

  constructor(
    apiKey: string | undefined,
    private readonly defaultModel: string = DEFAULT_IMAGE_MODEL
  ) {
    if (!apiKey) {
      throw new AuthError('GEMINI_API_KEY is required for the gemini image provider');
    }
    this.client = new GoogleGenAI({ apiKey });
  }

  async generate(request: ImageRequest): Promise<ModelOutcome<GeneratedImage>> {
    const model = request.model || this.defaultModel;
    // Reference images go first so the text instructions can refer to them.
    const parts: Part[] = [
      ...request.referenceImages.map((image) => ({
        inlineData: { mimeType: image.mimeType, data: image.data.toString('base64') }
      })),
      { text: request.prompt }
    ];

    logger.debug(
      { id: request.id, model, references: request.referenceImages.length, imageSize: request.imageSize },
      'Requesting image'
    );

    try {
      const response = await this.client.models.generateContent({
        model,
        contents: [{ role: 'user', parts }],
        config: {
          responseModalities: [Modality.TEXT, Modality.IMAGE],
          imageConfig: {
            aspectRatio: request.aspectRatio,
            imageSize: request.imageSize
          }
        }
      });

      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        return fatal('blocked', `Prompt blocked: ${blockReason}`);
      }

      for (const candidate of response.candidates ?? []) {
        for (const part of candidate.content?.parts ?? []) {
          if (part.inlineData?.data) {
            return success({
              data: Buffer.from(part.inlineData.data, 'base64'),
              mimeType: part.inlineData.mimeType ?? 'image/png'
            });
          }
        }
      }

      const finishReason = response.candidates?.[0]?.finishReason;
      return fatal(
        finishReason && finishReason !== FinishReason.STOP ? 'blocked' : 'empty_response',
        `No image returned${finishReason ? ` (finishReason ${finishReason})` : ''}`
      );
    } catch (error) {
      return classifyError(error);
    }
  }
}
