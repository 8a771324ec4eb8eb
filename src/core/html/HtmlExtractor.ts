// src/core/html/HtmlExtractor.ts

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { ExtractionError } from '../../utils/errors';

// Elements that start and end a line of text
const BLOCK_TAGS = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'dd',
  'details',
  'div',
  'dl',
  'dt',
  'fieldset',
  'figcaption',
  'figure',
  'footer',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'summary',
  'table',
  'td',
  'th',
  'tr',
  'ul',
]);

const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template', 'head']);

const SKIPPED_LINK_SCHEMES = ['javascript:', 'mailto:', 'tel:'];

class LineCollector {
  readonly lines: string[] = [];
  private buffer: string[] = [];

  append(text: string): void {
    this.buffer.push(text);
  }

  breakLine(): void {
    const line = this.buffer.join('').replace(/\s+/g, ' ').trim();
    this.buffer = [];
    if (line) {
      this.lines.push(line);
    }
  }

  walk(node: AnyNode): void {
    if (isText(node)) {
      this.append(node.data);
      return;
    }

    if (isTag(node)) {
      const name = node.name.toLowerCase();
      if (HIDDEN_TAGS.has(name)) return;
      if (name === 'br') {
        this.breakLine();
        return;
      }

      const block = BLOCK_TAGS.has(name);
      if (block) this.breakLine();
      node.children.forEach((child) => this.walk(child));
      if (block) this.breakLine();
      return;
    }

    // Documents and CDATA sections; comments and directives have no children
    if (hasChildren(node)) {
      node.children.forEach((child) => this.walk(child));
    }
  }

  text(): string {
    this.breakLine();
    return this.lines.join('\n');
  }
}

function flatten(nodes: AnyNode[]): string {
  const collector = new LineCollector();
  nodes.forEach((node) => collector.walk(node));
  return collector.text();
}

/**
 * Visible text of the first element matching `locator` (a CSS selector).
 *
 * Block elements and `<br>` end a line, whitespace inside a line collapses to
 * single spaces, and empty lines are dropped.
 *
 * @throws {ExtractionError} If nothing matches the locator
 */
export function extractText(html: string, locator: string): string {
  const $ = cheerio.load(html);
  const root = $(locator).get(0);

  if (!root) {
    throw new ExtractionError(`Content anchor not found: ${locator}`, { locator });
  }

  return flatten([root]);
}

/**
 * Plain text of an HTML fragment (or of text without markup)
 */
export function htmlToText(fragment: string | null | undefined): string {
  if (!fragment) {
    return '';
  }

  const $ = cheerio.load(fragment, null, false);
  return flatten($.root().contents().toArray());
}

/**
 * Absolute http(s) URLs of the links inside the first element matching
 * `locator`, in document order. Relative hrefs resolve against `baseUrl`.
 *
 * @throws {ExtractionError} If nothing matches the locator
 */
export function extractLinks(html: string, locator: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const container = $(locator).first();

  if (container.length === 0) {
    throw new ExtractionError(`Link container not found: ${locator}`, { locator });
  }

  const links: string[] = [];

  container.find('a[href]').each((_, anchor) => {
    const href = $(anchor).attr('href')?.trim();
    if (!href || href.startsWith('#')) return;
    if (SKIPPED_LINK_SCHEMES.some((scheme) => href.toLowerCase().startsWith(scheme))) return;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }

    if (resolved.protocol === 'http:' || resolved.protocol === 'https:') {
      links.push(resolved.toString());
    }
  });

  return links;
}
