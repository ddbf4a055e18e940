import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

export const HTML_FIXTURE_IDS = ['catalog-listing', 'article-page'] as const;

export type HtmlFixtureId = (typeof HTML_FIXTURE_IDS)[number];

export interface HtmlFixture {
  readonly id: HtmlFixtureId;
  readonly path: string;
  readonly html: string;
  readonly description: string;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');

const DESCRIPTIONS: Record<HtmlFixtureId, string> = {
  'catalog-listing': 'Product grid with chrome (header, nav, aside, footer) and inline script and style.',
  'article-page': 'Short article without a main landmark, nested inside layout wrappers.'
};

const cache = new Map<HtmlFixtureId, HtmlFixture>();

export const isHtmlFixtureId = (value: string): value is HtmlFixtureId =>
  HTML_FIXTURE_IDS.some((id) => id === value);

export const loadHtmlFixture = (id: HtmlFixtureId): HtmlFixture => {
  const cached = cache.get(id);
  if (cached) {
    return cached;
  }

  const path = join(FIXTURE_ROOT, `${id}.html`);
  const fixture: HtmlFixture = Object.freeze({
    id,
    path,
    html: readFileSync(path, 'utf-8'),
    description: DESCRIPTIONS[id]
  });
  cache.set(id, fixture);
  return fixture;
};

export const getHtmlFixturePath = (id: HtmlFixtureId): string => join(FIXTURE_ROOT, `${id}.html`);
