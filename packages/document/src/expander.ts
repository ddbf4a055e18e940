import type { Excerpt, JobLogger } from '@scriptforge/core/jobs';

import { cheerioDocumentParser } from './cheerio-tree.js';
import { createExcerpt } from './excerpt.js';
import { isDocumentWrapper, type DocumentParser, type DocumentTree, type TreeElement } from './tree.js';

export const ANCHOR_WORD_LIMIT = 15;

const HEAD_METADATA_TAGS: ReadonlySet<string> = new Set(['title', 'meta']);

export interface ExpandContextOptions {
  readonly parser?: DocumentParser;
  readonly logger?: JobLogger;
}

const escapePattern = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const findAnchor = (fragment: DocumentTree): TreeElement | null => {
  for (const element of fragment.select('*')) {
    if (!isDocumentWrapper(element) && !HEAD_METADATA_TAGS.has(element.tagName)) {
      return element;
    }
  }
  return null;
};

const bodyOrDocument = (tree: DocumentTree, html: string): string => tree.body()?.outerHtml() ?? html;

/**
 * Widens the context around the first element of a previous excerpt by
 * locating its text in the full document and returning the enclosing subtree.
 * Never throws; any failure yields the whole document.
 */
export const expandContext = (
  fullDocument: string,
  lastExcerpt: string,
  options: ExpandContextOptions = {}
): Excerpt => {
  const parser = options.parser ?? cheerioDocumentParser;
  const logger = options.logger;

  try {
    const tree = parser.document(fullDocument);
    const anchor = findAnchor(parser.fragment(lastExcerpt));
    if (!anchor) {
      logger?.info('No anchor element in previous excerpt; using full body');
      return createExcerpt(bodyOrDocument(tree, fullDocument), 'expansion');
    }

    const words = anchor.text().split(/\s+/).filter((word) => word.length > 0).slice(0, ANCHOR_WORD_LIMIT);
    if (words.length === 0) {
      logger?.info('Anchor element has no text; using full body');
      return createExcerpt(bodyOrDocument(tree, fullDocument), 'expansion');
    }

    const pattern = new RegExp(words.map(escapePattern).join('\\s*'));
    const located = tree.textNodes().find((node) => pattern.test(node.value));
    if (!located) {
      logger?.info('Anchor text not found in document; using full body');
      return createExcerpt(bodyOrDocument(tree, fullDocument), 'expansion');
    }

    const container = located.parent?.parent() ?? null;
    if (container && !isDocumentWrapper(container)) {
      const subtree = container.outerHtml();
      logger?.info('Expanded context to enclosing element', { tag: container.tagName, length: subtree.length });
      return createExcerpt(subtree, 'expansion');
    }

    logger?.info('Enclosing element is the document body; using full body');
    return createExcerpt(bodyOrDocument(tree, fullDocument), 'expansion');
  } catch (error) {
    logger?.warn('Context expansion failed; using whole document', {
      error: error instanceof Error ? error.message : String(error)
    });
    return createExcerpt(fullDocument, 'expansion');
  }
};
