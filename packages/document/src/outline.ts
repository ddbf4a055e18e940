import type { JobLogger } from '@scriptforge/core/jobs';

import { cheerioDocumentParser } from './cheerio-tree.js';
import type { DocumentParser, TreeElement } from './tree.js';

export const OUTLINE_MAX_DEPTH = 7;
export const OUTLINE_MAX_CHILDREN = 11;
export const OUTLINE_CLASS_LIMIT = 3;

export const MISSING_BODY_OUTLINE = '<body> tag not found.';
export const OUTLINE_ERROR = 'Error: Could not generate HTML structure map.';

export interface StructuralOutlineOptions {
  readonly parser?: DocumentParser;
  readonly logger?: JobLogger;
}

const describeElement = (element: TreeElement): string => {
  let label = element.tagName;
  if (element.id !== undefined) {
    label += `#${element.id}`;
  }
  if (element.classNames.length > 0) {
    label += `.${element.classNames.slice(0, OUTLINE_CLASS_LIMIT).join('.')}`;
  }
  return label;
};

const renderOutline = (element: TreeElement, indent: string, depth: number): string => {
  let rendered = `${indent}<${describeElement(element)}>\n`;
  if (depth > OUTLINE_MAX_DEPTH) {
    return `${rendered}${indent}  [...max depth reached...]\n`;
  }

  const children = element.children();
  for (const [index, child] of children.entries()) {
    if (index >= OUTLINE_MAX_CHILDREN) {
      rendered += `${indent}  [...and more...]\n`;
      break;
    }
    rendered += renderOutline(child, `${indent}  `, depth + 1);
  }
  return rendered;
};

/** Indented tag map of the document body, bounded in depth and breadth. */
export const buildStructuralOutline = (html: string, options: StructuralOutlineOptions = {}): string => {
  const parser = options.parser ?? cheerioDocumentParser;
  try {
    const body = parser.document(html).body();
    if (!body) {
      options.logger?.warn('Document has no body; structural outline unavailable');
      return MISSING_BODY_OUTLINE;
    }
    const outline = renderOutline(body, '', 0);
    options.logger?.info('Generated structural outline', { length: outline.length });
    return outline;
  } catch (error) {
    options.logger?.warn('Could not generate structural outline', {
      error: error instanceof Error ? error.message : String(error)
    });
    return OUTLINE_ERROR;
  }
};
