import OpenAI from 'openai';
import { createScopedLogger } from '@adforge/shared/logger';
import { AuthError } from '../errors.js';
import { classifyError, fatal, parseRetryAfterHeader, success, type ModelOutcome, type TextModel, type TextRequest } from './base.js';

const logger = createScopedLogger('providers.openai');

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

export class OpenAITextModel implements TextModel {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(
    apiKey: string | undefined,
    private readonly defaultModel: string = DEFAULT_OPENAI_MODEL
  ) {
    if (!apiKey) {
      throw new AuthError('OPENAI_API_KEY is required for the openai provider');
    }
    // Retries are owned by withRetry.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async generate(request: TextRequest): Promise<ModelOutcome<string>> {
    const model = request.model || this.defaultModel;
    logger.debug({ stage: request.stage, model }, 'Sending chat completion');

    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt }
        ],
        temperature: 0.7,
        seed: this.supportsSeed(model) ? request.seed : undefined,
        response_format: { type: 'json_object' }
      });

      const choice = response.choices[0];
      const content = choice?.message?.content;
      if (!content) {
        const refusal = choice?.message?.refusal;
        return refusal
          ? fatal('blocked', `Model refused the request: ${refusal}`)
          : fatal('empty_response', 'No content in response');
      }
      return success(content);
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        const retryAfter = error.headers?.['retry-after'];
        return classifyError(error, parseRetryAfterHeader(retryAfter));
      }
      return classifyError(error);
    }
  }

  private supportsSeed(model: string): boolean {
    return model.includes('gpt-4') || model.includes('gpt-3.5');
  }
}
