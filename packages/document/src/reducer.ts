import type { Excerpt, JobLogger } from '@scriptforge/core/jobs';

import { cheerioDocumentParser } from './cheerio-tree.js';
import { createExcerpt } from './excerpt.js';
import { loadStructuralKeywords, selectorsForObjective, type StructuralKeywordTable } from './keywords.js';
import { isDocumentWrapper, type DocumentParser, type TreeElement } from './tree.js';

export const NOISE_SELECTOR = 'script, style, nav, header, footer, aside';

export const MAIN_CONTENT_SELECTORS = [
  'main',
  '[role="main"]',
  'article',
  '#content',
  '#main',
  '.content',
  '.main'
] as const;

export const MATCHES_PER_SELECTOR = 20;
export const MAX_CONTEXT_BLOCKS = 30;
export const FALLBACK_LENGTH = 15_000;

export interface ReduceDocumentOptions {
  readonly parser?: DocumentParser;
  readonly keywords?: StructuralKeywordTable;
  readonly logger?: JobLogger;
}

const isContextCandidate = (element: TreeElement | null): element is TreeElement =>
  element !== null && !isDocumentWrapper(element);

const contextFor = (match: TreeElement): TreeElement | null => {
  const parent = match.parent();
  const grandparent = parent ? parent.parent() : null;
  if (isContextCandidate(grandparent)) {
    return grandparent;
  }
  if (isContextCandidate(parent)) {
    return parent;
  }
  return isContextCandidate(match) ? match : null;
};

/**
 * Projects a full HTML document onto the parts most likely to matter for the
 * objective. Never throws; on internal failure the raw document prefix is
 * returned instead.
 */
export const reduceDocument = (
  html: string,
  objective: string,
  options: ReduceDocumentOptions = {}
): Excerpt => {
  const parser = options.parser ?? cheerioDocumentParser;
  const logger = options.logger;

  try {
    const tree = parser.document(html);
    tree.remove(NOISE_SELECTOR);

    let region: TreeElement | null = null;
    for (const selector of MAIN_CONTENT_SELECTORS) {
      region = tree.selectFirst(selector);
      if (region) {
        logger?.debug('Located main content region', { selector });
        break;
      }
    }

    const body = tree.body();
    const scope = region ?? body ?? undefined;

    const matches: TreeElement[] = [];
    const selectors = selectorsForObjective(objective, options.keywords ?? loadStructuralKeywords());
    for (const selector of selectors) {
      const found = tree.select(selector, scope, MATCHES_PER_SELECTOR);
      if (found.length > 0) {
        logger?.debug('Matched priority elements', { selector, count: found.length });
        matches.push(...found);
      }
    }

    const parts: string[] = [];
    const title = tree.selectFirst('head title');
    if (title && title.text().length > 0) {
      parts.push(title.outerHtml());
    }
    const description = tree.selectFirst('head meta[name="description"]');
    if (description && description.attribute('content')) {
      parts.push(description.outerHtml());
    }

    if (region && matches.length === 0) {
      parts.push(region.outerHtml());
    } else {
      const blocks = new Set<TreeElement>();
      for (const match of new Set(matches)) {
        const context = contextFor(match);
        if (context) {
          blocks.add(context);
        }
      }
      logger?.debug('Collected context blocks', { count: blocks.size });
      for (const block of [...blocks].slice(0, MAX_CONTEXT_BLOCKS)) {
        parts.push(block.outerHtml());
      }
    }

    if (parts.length <= 2) {
      const fallback = body ? body.outerHtml() : tree.serialize();
      parts.push(fallback.slice(0, FALLBACK_LENGTH));
    }

    return createExcerpt(parts.join('\n\n'), 'reduction');
  } catch (error) {
    logger?.warn('Document reduction failed; using raw prefix', {
      error: error instanceof Error ? error.message : String(error)
    });
    return createExcerpt(html.slice(0, FALLBACK_LENGTH), 'reduction');
  }
};
