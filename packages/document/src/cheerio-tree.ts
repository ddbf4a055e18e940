import { load, type CheerioAPI } from 'cheerio';
import { ElementType } from 'domelementtype';
import { hasChildren, type AnyNode, type Element, type Text } from 'domhandler';

import type { DocumentParser, DocumentTree, TreeElement, TreeTextNode } from './tree.js';

const DECLARED_BODY_PATTERN = /<body[\s>/]/i;

const isElementNode = (node: AnyNode | null | undefined): node is Element =>
  node !== null &&
  node !== undefined &&
  (node.type === ElementType.Tag || node.type === ElementType.Script || node.type === ElementType.Style);

const isTextNode = (node: AnyNode): node is Text => node.type === ElementType.Text;

const collectText = (root: AnyNode): string[] => {
  const segments: string[] = [];
  const stack: AnyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    if (isTextNode(node)) {
      const trimmed = node.data.trim();
      if (trimmed.length > 0) {
        segments.push(trimmed);
      }
      continue;
    }
    if (hasChildren(node)) {
      for (let index = node.children.length - 1; index >= 0; index -= 1) {
        stack.push(node.children[index]);
      }
    }
  }

  return segments;
};

class CheerioTree implements DocumentTree {
  private readonly $: CheerioAPI;
  private readonly declaresBody: boolean;
  private readonly wrappers = new WeakMap<Element, TreeElement>();
  private readonly nodes = new WeakMap<TreeElement, Element>();

  constructor($: CheerioAPI, declaresBody: boolean) {
    this.$ = $;
    this.declaresBody = declaresBody;
  }

  select(selector: string, scope?: TreeElement, limit?: number): readonly TreeElement[] {
    const scopeNode = scope ? this.nodes.get(scope) : undefined;
    const matches = scopeNode ? this.$(scopeNode).find(selector).toArray() : this.$.root().find(selector).toArray();
    const bounded = limit === undefined ? matches : matches.slice(0, limit);
    return bounded.map((node) => this.wrap(node));
  }

  selectFirst(selector: string, scope?: TreeElement): TreeElement | null {
    return this.select(selector, scope, 1)[0] ?? null;
  }

  remove(selector: string): void {
    this.$(selector).remove();
  }

  body(): TreeElement | null {
    if (!this.declaresBody) {
      return null;
    }
    const node = this.$('body').get(0);
    return node ? this.wrap(node) : null;
  }

  textNodes(): readonly TreeTextNode[] {
    const found: TreeTextNode[] = [];
    const root = this.$.root().get(0);
    if (!root) {
      return found;
    }

    const stack: AnyNode[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) {
        break;
      }
      if (isTextNode(node)) {
        const parent = isElementNode(node.parent) ? this.wrap(node.parent) : null;
        found.push({ value: node.data, parent });
        continue;
      }
      if (hasChildren(node)) {
        for (let index = node.children.length - 1; index >= 0; index -= 1) {
          stack.push(node.children[index]);
        }
      }
    }

    return found;
  }

  serialize(): string {
    return this.$.html();
  }

  private wrap(node: Element): TreeElement {
    const cached = this.wrappers.get(node);
    if (cached) {
      return cached;
    }

    const element: TreeElement = {
      tagName: node.name.toLowerCase(),
      id: node.attribs.id,
      classNames: (node.attribs.class ?? '').split(/\s+/).filter((name) => name.length > 0),
      parent: () => (isElementNode(node.parent) ? this.wrap(node.parent) : null),
      children: () => node.children.filter(isElementNode).map((child) => this.wrap(child)),
      attribute: (name: string) => node.attribs[name],
      text: () => collectText(node).join(' '),
      outerHtml: () => this.$.html(node)
    };

    this.wrappers.set(node, element);
    this.nodes.set(element, node);
    return element;
  }
}

export const cheerioDocumentParser: DocumentParser = {
  document: (html: string) => new CheerioTree(load(html), DECLARED_BODY_PATTERN.test(html)),
  fragment: (html: string) => new CheerioTree(load(html, null, false), false)
};
