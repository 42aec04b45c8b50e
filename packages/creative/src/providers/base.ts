import { errorMessage } from '@adforge/shared/utils';
import type { StageKind } from '../types.js';

export type FatalCategory =
  | 'auth'
  | 'invalid_request'
  | 'server'
  | 'blocked'
  | 'empty_response'
  | 'network'
  | 'unknown';

/**
 * Result of exactly one outbound model request. Providers never retry; the caller
 * decides what to do with a rate limit.
 */
export type ModelOutcome<T> =
  | { kind: 'success'; output: T }
  | { kind: 'rate_limited'; message: string; retryAfterMs?: number }
  | { kind: 'fatal'; category: FatalCategory; message: string; status?: number };

export interface TextRequest {
  stage: StageKind;
  system: string;
  prompt: string;
  model?: string;
  seed?: number;
}

export interface TextModel {
  readonly name: string;
  generate(request: TextRequest): Promise<ModelOutcome<string>>;
}

export interface ReferenceImage {
  fileName: string;
  mimeType: string;
  data: Buffer;
}

export interface ImageRequest {
  id: string;
  prompt: string;
  referenceImages: ReferenceImage[];
  aspectRatio: string;
  imageSize: string;
  model?: string;
}

export interface GeneratedImage {
  data: Buffer;
  mimeType: string;
}

export interface ImageModel {
  readonly name: string;
  generate(request: ImageRequest): Promise<ModelOutcome<GeneratedImage>>;
}

export const success = <T>(output: T): ModelOutcome<T> => ({ kind: 'success', output });

export const fatal = (category: FatalCategory, message: string, status?: number): ModelOutcome<never> => ({
  kind: 'fatal',
  category,
  message,
  status
});

const RETRY_DELAY_PATTERNS = [
  /retryDelay['":= ]+"?(\d+(?:\.\d+)?)s"?/i,
  /retry[- ]after[: ]+(\d+(?:\.\d+)?)/i,
  /retry in (\d+(?:\.\d+)?)s/i
];

/** Reads a server-suggested wait (in ms) out of an error message or details payload. */
export function parseRetryDelay(text: string): number | undefined {
  for (const pattern of RETRY_DELAY_PATTERNS) {
    const match = text.match(pattern);
    if (match?.[1]) {
      return Math.round(Number.parseFloat(match[1]) * 1000);
    }
  }
  return undefined;
}

/** `Retry-After` is either delta-seconds or an HTTP date. */
export function parseRetryAfterHeader(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/** SDK errors disagree on where the HTTP status lives. */
export function extractStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === 'number') return error.status;
  if (typeof error.statusCode === 'number') return error.statusCode;
  if (typeof error.code === 'number') return error.code;
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  const message = typeof error.message === 'string' ? error.message : '';
  const match = message.match(/\[(\d{3})[ \]]/) ?? message.match(/"code":\s*(\d{3})/);
  return match?.[1] ? Number.parseInt(match[1], 10) : undefined;
}

const QUOTA_PATTERN = /RESOURCE_EXHAUSTED|rate.?limit|quota|too many requests/i;
const OVERLOADED_PATTERN = /overloaded|UNAVAILABLE/i;
const BLOCKED_PATTERN = /SAFETY|blocked|PROHIBITED_CONTENT/;

/**
 * Maps a failed request onto the outcome union. 429 and quota messages are
 * transient, as is 503; everything else is fatal for this call.
 */
export function classifyFailure(failure: {
  status?: number;
  message: string;
  retryAfterMs?: number;
}): ModelOutcome<never> {
  const { status, message } = failure;
  const retryAfterMs = failure.retryAfterMs ?? parseRetryDelay(message);

  if (status === 429 || (status === undefined && QUOTA_PATTERN.test(message))) {
    return { kind: 'rate_limited', message, retryAfterMs };
  }
  if (status === 503 || (status === undefined && OVERLOADED_PATTERN.test(message))) {
    return { kind: 'rate_limited', message, retryAfterMs };
  }
  if (status === 401 || status === 403) {
    return fatal('auth', message, status);
  }
  if (status === 400 || status === 404 || status === 422) {
    return fatal(BLOCKED_PATTERN.test(message) ? 'blocked' : 'invalid_request', message, status);
  }
  if (status !== undefined && status >= 500) {
    return fatal('server', message, status);
  }
  if (status === undefined && /ECONNRESET|ENOTFOUND|ETIMEDOUT|fetch failed|socket hang up/i.test(message)) {
    return fatal('network', message);
  }
  return fatal('unknown', message, status);
}

/** Classifies anything an SDK throws. */
export function classifyError(error: unknown, retryAfterMs?: number): ModelOutcome<never> {
  const message = errorMessage(error);
  return classifyFailure({ status: extractStatusCode(error), message, retryAfterMs });
}
