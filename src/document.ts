import * as cheerio from 'cheerio';
import { cloneNode, hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';

/** Read access to one element of a parsed page. */
export interface ElementHandle {
  readonly tagName: string;
  attr(name: string): string | undefined;
  /** Descendant text joined by `separator`, whitespace collapsed and trimmed. */
  text(separator?: string): string;
}

/**
 * Query surface the checks need from a parsed page. Implement it once per
 * parser library; `CheerioDocument` is the one that ships.
 */
export interface DocumentHandle {
  find(tag: string): ElementHandle | undefined;
  findAll(tags: string | readonly string[]): ElementHandle[];
  findWhere(predicate: (el: ElementHandle) => boolean): ElementHandle[];
  select(selector: string): ElementHandle[];
  text(separator?: string): string;
  /** Narrows the handle to the first matching element's subtree. Shares nodes with this handle. */
  scope(tag: string): DocumentHandle | undefined;
  /** Deep copy detached from this handle; removals on it leave the original untouched. */
  clone(): DocumentHandle;
  /** Detaches every descendant matching `selector`, returning how many went. */
  remove(selector: string): number;
}

// text extraction skips elements a browser never renders as text
const NON_TEXT_TAGS = new Set(['script', 'style', 'template', 'noscript']);

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    out.push(node.data);
    return;
  }
  if (isTag(node) && NON_TEXT_TAGS.has(node.name)) return;
  if (hasChildren(node)) for (const child of node.children) collectText(child, out);
}

function normalizeText(nodes: AnyNode[], separator: string): string {
  const parts: string[] = [];
  for (const node of nodes) collectText(node, parts);
  return parts.join(separator).replace(/\s+/g, ' ').trim();
}

class CheerioElement implements ElementHandle {
  constructor(private readonly node: Element) {}

  get tagName(): string {
    return this.node.name;
  }

  attr(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.node.attribs, name) ? this.node.attribs[name] : undefined;
  }

  text(separator = ''): string {
    return normalizeText([this.node], separator);
  }
}

export class CheerioDocument implements DocumentHandle {
  private constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly nodes: AnyNode[],
  ) {}

  /**
   * Document mode always synthesizes html/head/body, so a missing `<body>`
   * is only observable on a handle parsed with `fragment`, which skips those
   * implied wrappers.
   */
  static parse(html: string, options: { fragment?: boolean } = {}): CheerioDocument {
    const $ = cheerio.load(html, undefined, !options.fragment);
    return new CheerioDocument($, $.root().toArray());
  }

  private query(selector: string): Element[] {
    return this.$(this.nodes).find(selector).toArray();
  }

  find(tag: string): ElementHandle | undefined {
    const [first] = this.query(tag);
    return first ? new CheerioElement(first) : undefined;
  }

  findAll(tags: string | readonly string[]): ElementHandle[] {
    const selector = typeof tags === 'string' ? tags : tags.join(', ');
    return this.select(selector);
  }

  findWhere(predicate: (el: ElementHandle) => boolean): ElementHandle[] {
    return this.select('*').filter(predicate);
  }

  select(selector: string): ElementHandle[] {
    return this.query(selector).map((el) => new CheerioElement(el));
  }

  text(separator = ''): string {
    return normalizeText(this.nodes, separator);
  }

  scope(tag: string): DocumentHandle | undefined {
    const [first] = this.query(tag);
    return first ? new CheerioDocument(this.$, [first]) : undefined;
  }

  clone(): DocumentHandle {
    return new CheerioDocument(this.$, this.nodes.map((n) => cloneNode(n, true)));
  }

  remove(selector: string): number {
    const matched = this.$(this.nodes).find(selector);
    matched.remove();
    return matched.length;
  }
}
