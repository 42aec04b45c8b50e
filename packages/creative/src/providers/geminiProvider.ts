import { GoogleGenerativeAI } from '@google/generative-ai';
import { createScopedLogger } from '@adforge/shared/logger';
import { AuthError } from '../errors.js';
import { classifyError, fatal, success, type ModelOutcome, type TextModel, type TextRequest } from './base.js';

const logger = createScopedLogger('providers.gemini');

export const DEFAULT_GEMINI_TEXT_MODEL = 'gemini-2.5-flash';

export class GeminiTextModel implements TextModel {
  readonly name = 'gemini';
  private client: GoogleGenerativeAI;

  constructor(
    apiKey: string | undefined,
    private readonly defaultModel: string = DEFAULT_GEMINI_TEXT_MODEL
  ) {
    if (!apiKey) {
      throw new AuthError('GEMINI_API_KEY is required for the gemini provider');
    }
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: TextRequest): Promise<ModelOutcome<string>> {
    const modelName = request.model || this.defaultModel;
    logger.debug({ stage: request.stage, model: modelName }, 'Sending generateContent');

    try {
      const model = this.client.getGenerativeModel({
        model: modelName,
        systemInstruction: request.system,
        generationConfig: {
          temperature: 0.7,
          responseMimeType: 'application/json'
        }
      });

      const response = await model.generateContent(request.prompt);
      const blockReason = response.response.promptFeedback?.blockReason;
      if (blockReason) {
        return fatal('blocked', `Prompt blocked: ${blockReason}`);
      }

      const text = response.response.text();
      if (!text) {
        return fatal('empty_response', 'No content in response');
      }
      return success(text);
    } catch (error) {
      return classifyError(error);
    }
  }
}
