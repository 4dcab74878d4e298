/**
 * RSS 2.0, RSS 1.0 (RDF) and Atom 1.0 parsing with fast-xml-parser
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { FeedDocument, FeedEntry, FeedLink } from './feed.types.js';

type XmlNode = Record<string, unknown>;

const ARRAY_TAGS = new Set(['item', 'entry', 'link', 'enclosure']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  removeNSPrefix: true,
  parseTagValue: false,
  htmlEntities: true,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

/**
 * Parse a feed document
 *
 * @throws Error if the text is not well-formed XML or not an RSS/Atom feed
 */
export function parseFeedDocument(text: string): FeedDocument {
  const xml = text.trimStart();
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new Error(`Malformed XML (${code}) at line ${line}, column ${col}: ${msg}`);
  }

  const root = asNode(parser.parse(xml));

  const channel = asNode(asNode(root?.rss)?.channel);
  if (channel) {
    return { title: getText(channel.title), entries: asNodes(channel.item).map(parseRssItem) };
  }

  const rdf = asNode(root?.RDF);
  if (rdf) {
    return { title: getText(asNode(rdf.channel)?.title), entries: asNodes(rdf.item).map(parseRssItem) };
  }

  const atom = asNode(root?.feed);
  if (atom) {
    return { title: getText(atom.title), entries: asNodes(atom.entry).map(parseAtomEntry) };
  }

  throw new Error('Document is not an RSS or Atom feed');
}

function parseRssItem(item: XmlNode): FeedEntry {
  const links: FeedLink[] = [];

  for (const link of asArray(item.link)) {
    const parsed = parseLink(link);
    if (parsed) links.push(parsed);
  }

  for (const enclosure of asNodes(item.enclosure)) {
    const href = getText(enclosure['@_url']);
    if (href) {
      links.push({ href, type: getText(enclosure['@_type']), rel: 'enclosure' });
    }
  }

  return toEntry(getText(item.title), links);
}

function parseAtomEntry(entry: XmlNode): FeedEntry {
  const links: FeedLink[] = [];

  for (const link of asArray(entry.link)) {
    const parsed = parseLink(link);
    if (parsed) links.push(parsed);
  }

  return toEntry(getText(entry.title), links);
}

/**
 * RSS <link> carries the URL as text, Atom <link> as attributes
 */
function parseLink(value: unknown): FeedLink | undefined {
  const node = asNode(value);
  if (node && node['@_href'] !== undefined) {
    const href = getText(node['@_href']);
    return href ? { href, type: getText(node['@_type']), rel: getText(node['@_rel']) } : undefined;
  }
  const href = getText(value);
  return href ? { href } : undefined;
}

function toEntry(title: string | undefined, links: FeedLink[]): FeedEntry {
  const primary = links.find((link) => link.rel === undefined || link.rel === 'alternate') ?? links[0];
  return { title: title ?? '', link: primary?.href, links };
}

function getText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim() || undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  const node = asNode(value);
  return node ? getText(node['#text']) : undefined;
}

function asNode(value: unknown): XmlNode | undefined {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return undefined;
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function asNodes(value: unknown): XmlNode[] {
  return asArray(value).flatMap<XmlNode>((item) => asNode(item) ?? []);
}
