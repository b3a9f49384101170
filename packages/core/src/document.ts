import { text } from 'stream/consumers';
import { JsonStatError } from './errors.js';
import { createFetcher, type DocumentFetcher, type FetchOptions } from './http.js';
import { decodeAll, decodeDimension, type DecodeOptions } from './jsonstat/decode.js';
import { encode, encodeDimension } from './jsonstat/encode.js';
import { collectionSchema, jsonObjectSchema, tableSchema } from './jsonstat/schema.js';
import type {
  CollectionItem,
  DocumentClass,
  JsonStatDocument,
  JsonValue,
  Table
} from './types.js';

export type ByteStream = AsyncIterable<string | Uint8Array>;
export type DocumentSource = Table | JsonStatDocument | string | ByteStream;
export type OutputFormat = 'jsonstat' | 'table';

export interface ReadOptions extends FetchOptions {
  /** Replaces the default undici-based fetcher for URL sources. */
  fetcher?: DocumentFetcher;
}

const URL_PREFIXES = ['http://', 'https://', 'ftp://', 'ftps://'];

export function isUrl(source: string): boolean {
  return URL_PREFIXES.some(prefix => source.startsWith(prefix));
}

function isByteStream(source: DocumentSource): source is ByteStream {
  return typeof source === 'object' && source !== null && Symbol.asyncIterator in source;
}

function isTable(source: Table | JsonStatDocument): source is Table {
  return tableSchema.safeParse(source).success;
}

export function toDocument(value: JsonValue, origin: string): JsonStatDocument {
  if (value && typeof value === 'object' && !Array.isArray(value)) return value;
  throw new JsonStatError('MalformedDocument', `${origin} is not a JSON object`, origin);
}

/** Parses JSON text; syntax errors propagate from `JSON.parse` unchanged. */
export function parseDocument(source: string): JsonStatDocument {
  const raw: unknown = JSON.parse(source);
  const parsed = jsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new JsonStatError('MalformedDocument', 'JSON text is not a JSON object', 'text');
  }
  return parsed.data;
}

async function fetchJsonStat(url: string, options: ReadOptions): Promise<JsonStatDocument> {
  const fetcher = options.fetcher ?? createFetcher(options);
  return toDocument(await fetcher(url), url);
}

/**
 * Reads a document from a table (encoded as a 2.0 dataset), a deserialized
 * object, a URL, JSON text or a text/byte stream.
 */
export async function read(source: DocumentSource, options: ReadOptions = {}): Promise<JsonStatDocument> {
  if (typeof source === 'string') {
    return isUrl(source) ? fetchJsonStat(source, options) : parseDocument(source);
  }
  if (isByteStream(source)) {
    return parseDocument(await text(source));
  }
  if (isTable(source)) {
    return encode(source, { version: '2.0' });
  }
  return source;
}

export async function readDimension(source: DocumentSource, options: ReadOptions = {}): Promise<JsonStatDocument> {
  if (typeof source === 'object' && !isByteStream(source) && isTable(source)) {
    return encodeDimension(source);
  }
  return read(source, options);
}

export function documentClass(document: JsonStatDocument): DocumentClass {
  const cls = document.class;
  return cls === 'dimension' || cls === 'collection' ? cls : 'dataset';
}

export function write(document: JsonStatDocument, format: 'jsonstat'): string;
export function write(document: JsonStatDocument, format: 'table', options?: DecodeOptions): Table;
export function write(document: JsonStatDocument, format: string, options?: DecodeOptions): string | Table;
export function write(document: JsonStatDocument, format: string, options: DecodeOptions = {}): string | Table {
  if (format === 'jsonstat') {
    return JSON.stringify(document);
  }
  if (format !== 'table') {
    throw new JsonStatError('UnsupportedOutputFormat', `Allowed formats are "jsonstat" or "table", got "${format}"`, format);
  }

  switch (documentClass(document)) {
    case 'dimension':
      return decodeDimension(document);
    case 'collection':
      throw new JsonStatError(
        'UnsupportedOutputFormat',
        'A collection has no single table; use walkCollection',
        format
      );
    case 'dataset': {
      const [first] = decodeAll(document, options);
      if (!first) {
        throw new JsonStatError('MalformedDocument', 'Document holds no dataset', 'dataset');
      }
      return first;
    }
  }
}

export function collectionItems(document: JsonStatDocument): CollectionItem[] {
  const parsed = collectionSchema.safeParse(document);
  if (!parsed.success) {
    throw new JsonStatError('MalformedDocument', 'Collection has no valid link.item list', 'link');
  }
  return parsed.data.link.item;
}

export interface CollectionEntry {
  item: CollectionItem;
  document: JsonStatDocument;
}

/** Fetches the i-th item of a collection. */
export async function collectionItem(
  document: JsonStatDocument,
  i: number,
  options: ReadOptions = {}
): Promise<CollectionEntry> {
  const items = collectionItems(document);
  const item = items[i];
  if (!item) {
    throw new JsonStatError('IndexOutOfRange', `Collection has ${items.length} items, no item ${i}`, i);
  }
  return { item, document: await fetchJsonStat(item.href, options) };
}

export interface WalkOptions extends ReadOptions, DecodeOptions {}

/**
 * Decodes every dataset reachable from a collection, following nested
 * collections depth-first in item order. Dimension items are skipped and
 * a collection already visited is not fetched again.
 */
export async function walkCollection(document: JsonStatDocument, options: WalkOptions = {}): Promise<Table[]> {
  const tables: Table[] = [];
  const visited = new Set<string>();
  const stack: CollectionItem[][] = [collectionItems(document).slice().reverse()];

  while (stack.length) {
    const pending = stack[stack.length - 1];
    const item = pending.pop();
    if (!item) {
      stack.pop();
      continue;
    }

    if (item.class === 'dataset') {
      const dataset = await fetchJsonStat(item.href, options);
      tables.push(write(dataset, 'table', options));
    } else if (item.class === 'collection' && !visited.has(item.href)) {
      visited.add(item.href);
      const nested = await fetchJsonStat(item.href, options);
      stack.push(collectionItems(nested).slice().reverse());
    }
  }

  return tables;
}
