// src/core/sitemap/SitemapReader.ts

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { HttpCore } from '../http/HttpCore';
import { MalformedResponseError } from '../../utils/errors';

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

// Root element -> entry element
const ENTRY_TAGS = new Map([
  ['urlset', 'url'],
  ['sitemapindex', 'sitemap'],
]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  isArray: (name) => [...ENTRY_TAGS.values()].includes(localName(name)),
});

const ElementSchema = z.record(z.unknown());
const EntryListSchema = z.array(z.unknown());

function localName(qualifiedName: string): string {
  const separator = qualifiedName.indexOf(':');
  return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}

function prefixOf(qualifiedName: string): string | undefined {
  const separator = qualifiedName.indexOf(':');
  return separator === -1 ? undefined : qualifiedName.slice(0, separator);
}

function qualify(prefix: string | undefined, name: string): string {
  return prefix === undefined ? name : `${prefix}:${name}`;
}

/**
 * `<loc>` values of a sitemap (`urlset`) or sitemap index, in document order.
 *
 * Only roots in the sitemap namespace count, whether it is the default
 * namespace or bound to a prefix; anything else yields no entries.
 *
 * @throws {MalformedResponseError} If the document is not well-formed XML
 */
export function parseSitemap(xml: string): string[] {
  if (!xml.trim()) {
    throw new MalformedResponseError('Sitemap document is empty');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new MalformedResponseError(`XML parsing failed: ${validation.err.msg}`, {
      line: validation.err.line,
      code: validation.err.code,
    });
  }

  const document = ElementSchema.parse(xmlParser.parse(xml));
  const rootName = Object.keys(document).find((name) => ENTRY_TAGS.has(localName(name)));
  const entryName = rootName === undefined ? undefined : ENTRY_TAGS.get(localName(rootName));
  if (rootName === undefined || entryName === undefined) {
    return [];
  }

  // An element without attributes or children parses to a string
  const root = document[rootName];
  if (typeof root === 'string') {
    return [];
  }

  const parsedRoot = ElementSchema.safeParse(root);
  if (!parsedRoot.success) {
    throw new MalformedResponseError('Unexpected sitemap structure', { root: rootName });
  }

  const prefix = prefixOf(rootName);
  const namespace = parsedRoot.data[prefix === undefined ? 'xmlns' : `xmlns:${prefix}`];
  if (namespace !== SITEMAP_NAMESPACE) {
    return [];
  }

  const entryTag = qualify(prefix, entryName);
  const entries = EntryListSchema.safeParse(parsedRoot.data[entryTag] ?? []);
  if (!entries.success) {
    throw new MalformedResponseError('Unexpected sitemap structure', {
      issues: entries.error.errors.map((err) => `${entryTag}.${err.path.join('.')}: ${err.message}`),
    });
  }

  const locTag = qualify(prefix, 'loc');
  return entries.data.flatMap((entry) => {
    // Entries without children (`<url/>`) parse to strings and carry no loc
    const element = ElementSchema.safeParse(entry);
    const loc = element.success ? element.data[locTag] : undefined;
    const trimmed = typeof loc === 'string' ? loc.trim() : '';
    return trimmed ? [trimmed] : [];
  });
}

/**
 * Fetch a sitemap and return every listed URL
 */
export async function readSitemap(http: HttpCore, sitemapUrl: string): Promise<string[]> {
  const xml = await http.getText(sitemapUrl);
  return parseSitemap(xml);
}
