/**
 * Minimal read-mostly view over a parsed HTML document. The reducer, outline
 * and expander only talk to these interfaces so the parser behind them can be
 * swapped.
 */
export interface TreeElement {
  readonly tagName: string;
  readonly id: string | undefined;
  readonly classNames: readonly string[];
  /** Parent element, or null when the parent is the document itself. */
  parent(): TreeElement | null;
  children(): readonly TreeElement[];
  attribute(name: string): string | undefined;
  /** Descendant text, each trimmed segment joined by a single space. */
  text(): string;
  outerHtml(): string;
}

export interface TreeTextNode {
  readonly value: string;
  readonly parent: TreeElement | null;
}

export interface DocumentTree {
  select(selector: string, scope?: TreeElement, limit?: number): readonly TreeElement[];
  selectFirst(selector: string, scope?: TreeElement): TreeElement | null;
  remove(selector: string): void;
  /** The body element, or null when the source markup never declared one. */
  body(): TreeElement | null;
  textNodes(): readonly TreeTextNode[];
  serialize(): string;
}

export interface DocumentParser {
  document(html: string): DocumentTree;
  fragment(html: string): DocumentTree;
}

export const DOCUMENT_WRAPPER_TAGS: ReadonlySet<string> = new Set(['html', 'head', 'body']);

export const isDocumentWrapper = (element: TreeElement): boolean => DOCUMENT_WRAPPER_TAGS.has(element.tagName);
