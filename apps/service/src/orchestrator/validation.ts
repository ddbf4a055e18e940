import type { ValidationVerdict } from '@scriptforge/core';

export const DEFAULT_MINIMUM_COUNT_RATIO = 0.5;

const IMAGE_KEYWORDS = ['image', 'picture', 'photo', 'img'] as const;
const IMAGE_SAMPLE_SIZE = 3;

export interface ValidateOutputOptions {
  /** Fraction of a requested count below which an array result is rejected. */
  readonly minimumCountRatio?: number;
}

const invalid = (feedback: string): ValidationVerdict => ({ valid: false, feedback });
const valid = (feedback: string): ValidationVerdict => ({ valid: true, feedback });

type ParsedOutput = { readonly kind: 'json'; readonly value: unknown } | { readonly kind: 'text' };

const parseOutput = (rawOutput: string): ParsedOutput => {
  try {
    const value: unknown = JSON.parse(rawOutput);
    return { kind: 'json', value };
  } catch {
    return { kind: 'text' };
  }
};

const mentionsImages = (objective: string): boolean => {
  const lowered = objective.toLowerCase();
  return IMAGE_KEYWORDS.some((keyword) => lowered.includes(keyword));
};

const containsUrl = (record: unknown): boolean => {
  const serialized = typeof record === 'string' ? record : JSON.stringify(record) ?? '';
  return serialized.toLowerCase().includes('url') || serialized.includes('http');
};

const validateRecords = (
  records: readonly unknown[],
  objective: string,
  minimumCountRatio: number
): ValidationVerdict => {
  const count = records.length;
  if (count === 0) {
    return invalid(
      'The scraper returned an empty list. This could mean the CSS selectors are wrong or the data is loaded dynamically. Please try again.'
    );
  }

  const requested = /(\d+)/.exec(objective);
  if (requested) {
    const requestedCount = Number.parseInt(requested[1], 10);
    if (count < requestedCount * minimumCountRatio) {
      return invalid(
        `Only found ${count} items, but ${requestedCount} were requested. The scraper may need better selectors.`
      );
    }
  }

  if (mentionsImages(objective) && !records.slice(0, IMAGE_SAMPLE_SIZE).some(containsUrl)) {
    return invalid('Found data but no URLs detected. For image scraping, expected to find image URLs.');
  }

  return valid(`Successfully extracted ${count} items`);
};

/**
 * Judges whether a script's stdout plausibly satisfies the objective. Never
 * throws; unexpected failures yield an invalid verdict carrying the error.
 */
export const validateOutput = (
  rawOutput: string,
  objective: string,
  options: ValidateOutputOptions = {}
): ValidationVerdict => {
  const minimumCountRatio = options.minimumCountRatio ?? DEFAULT_MINIMUM_COUNT_RATIO;

  try {
    if (rawOutput.trim().length === 0) {
      return invalid('The scraper produced no output. This usually means no data was found or there was an error.');
    }

    const parsed = parseOutput(rawOutput);
    if (parsed.kind === 'text') {
      const lines = rawOutput.trim().split('\n');
      return valid(`Successfully extracted ${lines.length} lines of data`);
    }

    const { value } = parsed;
    if (Array.isArray(value)) {
      return validateRecords(value, objective, minimumCountRatio);
    }

    if (typeof value === 'object' && value !== null) {
      if (Object.keys(value).length === 0) {
        return invalid('The scraper returned an empty JSON object. The selectors might be incorrect.');
      }
      return valid('Successfully extracted structured data');
    }

    return invalid("The scraper output doesn't appear to contain structured data");
  } catch (error) {
    return invalid(`Error validating results: ${error instanceof Error ? error.message : String(error)}`);
  }
};
