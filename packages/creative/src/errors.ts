import type { FatalCategory } from './providers/base.js';
import type { StageKind } from './types.js';

export class AdPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'AdPipelineError';
  }
}

export class InputError extends AdPipelineError {
  constructor(message: string) {
    super(message, 'INPUT_INVALID');
    this.name = 'InputError';
  }
}

export class AuthError extends AdPipelineError {
  constructor(message: string, statusCode?: number) {
    super(message, 'AUTH_MISSING', statusCode);
    this.name = 'AuthError';
  }
}

/** Thrown inside the retry loop to request another attempt. */
export class RateLimitedError extends AdPipelineError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message, 'RATE_LIMITED', 429);
    this.name = 'RateLimitedError';
  }
}

export class FatalModelError extends AdPipelineError {
  constructor(
    message: string,
    public readonly category: FatalCategory,
    statusCode?: number
  ) {
    super(message, 'MODEL_FATAL', statusCode);
    this.name = 'FatalModelError';
  }
}

export class RetryExhaustedError extends AdPipelineError {
  constructor(
    label: string,
    public readonly attempts: number,
    public readonly lastError: RateLimitedError
  ) {
    super(`${label}: still rate limited after ${attempts} attempts (${lastError.message})`, 'RETRIES_EXHAUSTED', 429);
    this.name = 'RetryExhaustedError';
  }
}

export class InvalidModelOutputError extends AdPipelineError {
  constructor(
    message: string,
    public readonly rawPath?: string
  ) {
    super(message, 'MODEL_OUTPUT_INVALID');
    this.name = 'InvalidModelOutputError';
  }
}

export class StageFailureError extends AdPipelineError {
  constructor(
    public readonly stage: StageKind,
    public readonly reason: Error
  ) {
    super(`Stage ${stage} failed: ${reason.message}`, 'STAGE_FAILED');
    this.name = 'StageFailureError';
  }
}
