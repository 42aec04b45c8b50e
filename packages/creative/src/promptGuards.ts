import type { ZodTypeAny, z } from 'zod';
import { errorMessage } from '@adforge/shared/utils';
import { InvalidModelOutputError } from './errors.js';

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const match = trimmed.match(FENCE_PATTERN);
  return match?.[1] !== undefined ? match[1].trim() : trimmed;
}

/**
 * Parses model output that should be a JSON object. Falls back to the outermost
 * `{...}` block when the model wrapped it in prose.
 */
export function extractJson(raw: string): unknown {
  const text = stripCodeFences(raw);
  try {
    return JSON.parse(text);
  } catch {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new InvalidModelOutputError('No JSON object found in model output');
    }
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch (error) {
      throw new InvalidModelOutputError(
        `Model output is not valid JSON: ${errorMessage(error)}`
      );
    }
  }
}

export function parseModelJson<S extends ZodTypeAny>(raw: string, schema: S): z.infer<S> {
  const parsed = schema.safeParse(extractJson(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidModelOutputError(`Model output failed validation: ${issues}`);
  }
  return parsed.data;
}
