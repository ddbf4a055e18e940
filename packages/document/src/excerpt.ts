import type { Excerpt, ExcerptProvenance } from '@scriptforge/core/jobs';

export const MAX_EXCERPT_LENGTH = 75_000;
export const TRUNCATION_MARKER = '\n\n... (HTML truncated)';

/** Cuts `text` so that, marker included, it is exactly `MAX_EXCERPT_LENGTH` long. */
export const boundExcerptText = (text: string): string => {
  if (text.length <= MAX_EXCERPT_LENGTH) {
    return text;
  }
  return `${text.slice(0, MAX_EXCERPT_LENGTH - TRUNCATION_MARKER.length)}${TRUNCATION_MARKER}`;
};

export const createExcerpt = (text: string, provenance: ExcerptProvenance): Excerpt =>
  Object.freeze({ text: boundExcerptText(text), provenance });
