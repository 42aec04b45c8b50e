import OpenAI from 'openai';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { GeminiImageModel } from '../src/providers/geminiImageProvider.js';
import { GeminiTextModel } from '../src/providers/geminiProvider.js';
import { OpenAITextModel } from '../src/providers/openaiProvider.js';
import type { TextRequest } from '../src/providers/base.js';

const mocks = vi.hoisted(() => ({
  openaiCreate: vi.fn(),
  geminiGenerate: vi.fn(),
  getGenerativeModel: vi.fn(),
  genaiGenerate: vi.fn()
}));

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  class FakeOpenAI {
    static APIError = actual.default.APIError;
    chat = { completions: { create: mocks.openaiCreate } };
  }
  return { ...actual, default: FakeOpenAI };
});

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.getGenerativeModel;
  }
}));

vi.mock('@google/genai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@google/genai')>();
  class FakeGoogleGenAI {
    models = { generateContent: mocks.genaiGenerate };
  }
  return { ...actual, GoogleGenAI: FakeGoogleGenAI };
});

const request: TextRequest = { stage: 'research', system: 'You are a researcher.', prompt: 'Product name: Lamp' };

beforeEach(() => {
  vi.clearAllMocks();
  mocks.getGenerativeModel.mockImplementation(() => ({ generateContent: mocks.geminiGenerate }));
});

describe('OpenAITextModel', () => {
  const model = () => new OpenAITextModel('test-secret');

  it('sends a JSON-mode chat completion and returns the content', async () => {
    mocks.openaiCreate.mockResolvedValueOnce({ choices: [{ message: { content: '{"pains":["x"]}' } }] });

    await expect(model().generate(request)).resolves.toEqual({ kind: 'success', output: '{"pains":["x"]}' });
    expect(mocks.openaiCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'gpt-4o',
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: 'You are a researcher.' },
          { role: 'user', content: 'Product name: Lamp' }
        ]
      })
    );
  });

  it('maps a refusal to blocked and missing content to empty_response', async () => {
    mocks.openaiCreate.mockResolvedValueOnce({ choices: [{ message: { content: null, refusal: 'I cannot help' } }] });
    mocks.openaiCreate.mockResolvedValueOnce({ choices: [] });

    await expect(model().generate(request)).resolves.toMatchObject({
      kind: 'fatal',
      category: 'blocked',
      message: 'Model refused the request: I cannot help'
    });
    await expect(model().generate(request)).resolves.toMatchObject({
      kind: 'fatal',
      category: 'empty_response',
      message: 'No content in response'
    });
  });

  it('reads retry-after from a 429 API error', async () => {
    mocks.openaiCreate.mockRejectedValueOnce(
      new OpenAI.APIError(429, { message: 'Rate limit reached' }, undefined, { 'retry-after': '12' })
    );

    await expect(model().generate(request)).resolves.toMatchObject({ kind: 'rate_limited', retryAfterMs: 12_000 });
  });

  it('treats 401 as an auth failure', async () => {
    mocks.openaiCreate.mockRejectedValueOnce(new OpenAI.APIError(401, { message: 'Incorrect API key' }, undefined, {}));

    await expect(model().generate(request)).resolves.toMatchObject({ kind: 'fatal', category: 'auth', status: 401 });
  });
});

describe('GeminiTextModel', () => {
  const model = () => new GeminiTextModel('test-secret');

  it('passes the system prompt and JSON mime type and returns the text', async () => {
    mocks.geminiGenerate.mockResolvedValueOnce({ response: { text: () => '{"pains":["x"]}' } });

    await expect(model().generate(request)).resolves.toEqual({ kind: 'success', output: '{"pains":["x"]}' });
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-2.5-flash',
      systemInstruction: 'You are a researcher.',
      generationConfig: { temperature: 0.7, responseMimeType: 'application/json' }
    });
    expect(mocks.geminiGenerate).toHaveBeenCalledWith('Product name: Lamp');
  });

  it('reports a prompt block reason as blocked', async () => {
    mocks.geminiGenerate.mockResolvedValueOnce({
      response: { promptFeedback: { blockReason: 'SAFETY' }, text: () => '' }
    });

    await expect(model().generate(request)).resolves.toEqual({
      kind: 'fatal',
      category: 'blocked',
      message: 'Prompt blocked: SAFETY',
      status: undefined
    });
  });

  it('classifies a thrown 429 as rate limited', async () => {
    mocks.geminiGenerate.mockRejectedValueOnce(Object.assign(new Error('Resource exhausted'), { status: 429 }));

    await expect(model().generate(request)).resolves.toMatchObject({ kind: 'rate_limited' });
  });
});

describe('GeminiImageModel', () => {
  const model = () => new GeminiImageModel('test-secret');
  const imageRequest = {
    id: 'image_1',
    prompt: '{"task":"render"}',
    referenceImages: [{ fileName: 'a.png', mimeType: 'image/png', data: Buffer.from('ref') }],
    aspectRatio: '1:1',
    imageSize: '4K',
    model: 'test-image-model'
  };

  it('sends references before the prompt and returns the first inline image', async () => {
    mocks.genaiGenerate.mockResolvedValueOnce({
      candidates: [
        {
          finishReason: 'STOP',
          content: {
            parts: [
              { text: 'Here is your image' },
              { inlineData: { mimeType: 'image/jpeg', data: Buffer.from('jpeg-bytes').toString('base64') } }
            ]
          }
        }
      ]
    });

    await expect(model().generate(imageRequest)).resolves.toEqual({
      kind: 'success',
      output: { data: Buffer.from('jpeg-bytes'), mimeType: 'image/jpeg' }
    });

    const [call] = mocks.genaiGenerate.mock.calls[0] ?? [];
    expect(call).toMatchObject({
      model: 'test-image-model',
      contents: [
        {
          role: 'user',
          parts: [
            { inlineData: { mimeType: 'image/png', data: Buffer.from('ref').toString('base64') } },
            { text: '{"task":"render"}' }
          ]
        }
      ],
      config: { imageConfig: { aspectRatio: '1:1', imageSize: '4K' } }
    });
  });

  it('maps a non-STOP finish without an image to blocked', async () => {
    mocks.genaiGenerate.mockResolvedValueOnce({
      candidates: [{ finishReason: 'IMAGE_SAFETY', content: { parts: [{ text: 'Cannot render this' }] } }]
    });

    await expect(model().generate(imageRequest)).resolves.toMatchObject({
      kind: 'fatal',
      category: 'blocked',
      message: 'No image returned (finishReason IMAGE_SAFETY)'
    });
  });

  it('maps an empty response to empty_response', async () => {
    mocks.genaiGenerate.mockResolvedValueOnce({ candidates: [] });

    await expect(model().generate(imageRequest)).resolves.toMatchObject({
      kind: 'fatal',
      category: 'empty_response',
      message: 'No image returned'
    });
  });

  it('reads the retry delay from a quota error', async () => {
    mocks.genaiGenerate.mockRejectedValueOnce(
      Object.assign(new Error('{"error":{"code":429,"status":"RESOURCE_EXHAUSTED","details":[{"retryDelay":"31s"}]}}'), {
        status: 429
      })
    );

    await expect(model().generate(imageRequest)).resolves.toMatchObject({ kind: 'rate_limited', retryAfterMs: 31_000 });
  });
});
