import { Builder, parseStringPromise } from 'xml2js';
import { ParseError, errorMessage } from '../errors';

export interface OpmlFeed {
  kind: 'feed';
  title: string;
  xmlUrl: string;
  htmlUrl: string | null;
}

export interface OpmlFolder {
  kind: 'folder';
  title: string;
  children: OpmlOutline[];
}

export type OpmlOutline = OpmlFeed | OpmlFolder;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined ? [] : [value];
}

function attribute(attrs: Record<string, unknown>, ...names: string[]): string | null {
  for (const name of names) {
    const value = attrs[name];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  }
  return null;
}

function decodeOutline(node: unknown): OpmlOutline | null {
  if (!isRecord(node)) return null;
  const attrs = isRecord(node.$) ? node.$ : {};
  // Some exporters write xmlurl in lowercase
  const xmlUrl = attribute(attrs, 'xmlUrl', 'xmlurl');

  if (xmlUrl) {
    return {
      kind: 'feed',
      title: attribute(attrs, 'title', 'text') ?? xmlUrl,
      xmlUrl,
      htmlUrl: attribute(attrs, 'htmlUrl', 'htmlurl'),
    };
  }

  return {
    kind: 'folder',
    title: attribute(attrs, 'title', 'text') ?? 'Untitled',
    children: decodeOutlines(node.outline),
  };
}

function decodeOutlines(value: unknown): OpmlOutline[] {
  return asArray(value)
    .map(decodeOutline)
    .filter((outline): outline is OpmlOutline => outline !== null);
}

export async function decodeOpml(xml: string): Promise<OpmlOutline[]> {
  let doc: unknown;
  try {
    doc = await parseStringPromise(xml);
  } catch (error) {
    throw new ParseError(`XML parse error: ${errorMessage(error)}`, { cause: error });
  }

  if (!isRecord(doc) || !isRecord(doc.opml)) {
    throw new ParseError('Document is not OPML (missing <opml> root)');
  }

  const body = asArray(doc.opml.body)[0];
  if (!isRecord(body)) return [];
  return decodeOutlines(body.outline);
}

function encodeOutline(outline: OpmlOutline): Record<string, unknown> {
  if (outline.kind === 'feed') {
    const attrs: Record<string, string> = {
      type: 'rss',
      text: outline.title,
      title: outline.title,
      xmlUrl: outline.xmlUrl,
    };
    if (outline.htmlUrl) attrs.htmlUrl = outline.htmlUrl;
    return { $: attrs };
  }

  const folder: Record<string, unknown> = { $: { text: outline.title, title: outline.title } };
  if (outline.children.length > 0) {
    folder.outline = outline.children.map(encodeOutline);
  }
  return folder;
}

export function encodeOpml(outlines: OpmlOutline[], title = 'feedterm subscriptions'): string {
  const builder = new Builder({ xmldec: { version: '1.0', encoding: 'UTF-8' } });
  return builder.buildObject({
    opml: {
      $: { version: '2.0' },
      head: { title },
      body: { outline: outlines.map(encodeOutline) },
    },
  });
}

export function countFeeds(outlines: OpmlOutline[]): number {
  return outlines.reduce(
    (total, outline) => total + (outline.kind === 'feed' ? 1 : countFeeds(outline.children)),
    0
  );
}
