export const nowIso = () => new Date().toISOString();

/**
 * Lowercases and collapses every run of characters outside [a-z0-9] into a single
 * underscore. Used for product directory names and generated file names.
 */
export const slugify = (value: string): string =>
  value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
