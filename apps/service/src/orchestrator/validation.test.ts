import { describe, expect, it } from 'vitest';

import { validateOutput } from './validation.js';

describe('validateOutput', () => {
  it('rejects blank output', () => {
    expect(validateOutput('  \n ', 'get products')).toEqual({
      valid: false,
      feedback: 'The scraper produced no output. This usually means no data was found or there was an error.'
    });
  });

  it('rejects an empty list', () => {
    const verdict = validateOutput('[]', 'get products');
    expect(verdict.valid).toBe(false);
    expect(verdict.feedback).toContain('empty list');
  });

  it('rejects fewer than half of a requested count', () => {
    expect(validateOutput('[{"a":1},{"a":2}]', 'get 10 products')).toEqual({
      valid: false,
      feedback: 'Only found 2 items, but 10 were requested. The scraper may need better selectors.'
    });
  });

  it('accepts exactly half of a requested count', () => {
    const records = JSON.stringify([1, 2, 3, 4, 5].map((n) => ({ n })));
    expect(validateOutput(records, 'get 10 products')).toEqual({
      valid: true,
      feedback: 'Successfully extracted 5 items'
    });
  });

  it('honours a configured count ratio', () => {
    expect(validateOutput('[{"a":1},{"a":2}]', 'top 3 stories', { minimumCountRatio: 1 }).valid).toBe(false);
    expect(validateOutput('[{"a":1},{"a":2}]', 'top 3 stories', { minimumCountRatio: 0.5 }).valid).toBe(true);
  });

  it('requires urls in the first records when images were requested', () => {
    const withoutUrls = validateOutput('[{"title":"x"},{"title":"y"}]', 'collect product images');
    const withUrls = validateOutput('[{"src":"https://cdn.example.com/a.jpg"}]', 'collect product images');
    const withUrlKey = validateOutput('[{"imageURL":"/a.jpg"}]', 'every Photo on the page');

    expect(withoutUrls).toEqual({
      valid: false,
      feedback: 'Found data but no URLs detected. For image scraping, expected to find image URLs.'
    });
    expect(withUrls.valid).toBe(true);
    expect(withUrlKey.valid).toBe(true);
  });

  it('judges JSON objects by their emptiness', () => {
    expect(validateOutput('{}', 'details').valid).toBe(false);
    expect(validateOutput('{"title":"Cleat"}', 'details')).toEqual({
      valid: true,
      feedback: 'Successfully extracted structured data'
    });
  });

  it('accepts plain text and reports the line count', () => {
    expect(validateOutput('first\nsecond\n', 'titles')).toEqual({
      valid: true,
      feedback: 'Successfully extracted 2 lines of data'
    });
  });

  it('rejects JSON scalars', () => {
    expect(validateOutput('42', 'numbers')).toEqual({
      valid: false,
      feedback: "The scraper output doesn't appear to contain structured data"
    });
    expect(validateOutput('null', 'numbers').valid).toBe(false);
  });
});
