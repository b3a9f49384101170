import { JsonStatError } from '../errors.js';
import type { Cell, JsonStatDocument, JsonValue, Naming, Table } from '../types.js';
import { resolveDimension, resolveDimensions } from './dimension.js';
import { assertNaming, generateRows, rowCount } from './rows.js';
import { resolveValues } from './values.js';

export interface DecodeOptions {
  naming?: Naming;
  valueKey?: string;
}

export function decode(doc: JsonStatDocument, options: DecodeOptions = {}): Table {
  const naming = options.naming ?? 'label';
  const valueKey = options.valueKey ?? 'value';
  assertNaming(naming);

  const { names, dimensions } = resolveDimensions(doc, naming);
  const values = resolveValues(doc, valueKey);

  const expected = rowCount(dimensions);
  if (expected !== values.length) {
    throw new JsonStatError(
      'ShapeMismatch',
      `Dimensions describe ${expected} cells but ${valueKey} has ${values.length}`,
      valueKey
    );
  }

  const rows: Cell[][] = [];
  let i = 0;
  for (const categories of generateRows(dimensions, naming)) {
    rows.push([...categories, values[i]]);
    i++;
  }

  return { columns: [...names, valueKey], rows };
}

function asObject(value: JsonValue | undefined, name: string): JsonStatDocument {
  if (value && typeof value === 'object' && !Array.isArray(value)) return value;
  throw new JsonStatError('MalformedDocument', `Dataset ${name} is not an object`, name);
}

function looksLikeDataset(doc: JsonStatDocument): boolean {
  return doc.dimension !== undefined && doc.value !== undefined;
}

/**
 * Decodes every dataset in a source: a 2.0 dataset, a 1.x bundle
 * (`{ dataset1: {...}, dataset2: {...} }`) or a list of bundles.
 * Dimensions and collections hold no dataset and give an empty list.
 */
export function decodeAll(source: JsonValue, options: DecodeOptions = {}): Table[] {
  assertNaming(options.naming ?? 'label');

  if (Array.isArray(source)) {
    return source.flatMap((bundle, i) => decodeAll(asObject(bundle, `#${i}`), options));
  }

  const doc = asObject(source, 'document');
  if (doc.class !== undefined) {
    return doc.class === 'dataset' ? [decode(doc, options)] : [];
  }
  if (looksLikeDataset(doc)) {
    return [decode(doc, options)];
  }
  return Object.keys(doc).map(name => decode(asObject(doc[name], name), options));
}

/** Table of a 2.0 dimension document: `id`, the dimension label, `index`. */
export function decodeDimension(doc: JsonStatDocument): Table {
  const label = typeof doc.label === 'string' && doc.label ? doc.label : 'label';
  const categories = resolveDimension(doc, label, 'label');
  return {
    columns: ['id', label, 'index'],
    rows: categories.map(category => [category.id, category.label, category.position])
  };
}
