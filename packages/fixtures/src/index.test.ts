import { describe, expect, it } from 'vitest';

import { getHtmlFixturePath, isHtmlFixtureId, loadHtmlFixture } from './index.js';

describe('html fixture loader', () => {
  it('loads fixture markup and memoizes it', () => {
    const first = loadHtmlFixture('catalog-listing');
    const second = loadHtmlFixture('catalog-listing');

    expect(first.html).toContain('Stainless Cleat');
    expect(first).toBe(second);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('returns file system paths for fixtures', () => {
    expect(getHtmlFixturePath('article-page')).toMatch(/fixtures[\\/]article-page\.html$/);
    expect(loadHtmlFixture('article-page').path).toBe(getHtmlFixturePath('article-page'));
  });

  it('narrows fixture identifiers', () => {
    expect(isHtmlFixtureId('catalog-listing')).toBe(true);
    expect(isHtmlFixtureId('product-simple')).toBe(false);
  });
});
