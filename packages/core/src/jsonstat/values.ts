import { JsonStatError } from '../errors.js';
import type { Cell, JsonStatDocument } from '../types.js';
import { dimensionSizesSchema, hasOwn, valuesSchema } from './schema.js';

const FLAT_INDEX = /^\d+$/;
const MAX_ARRAY_LENGTH = 2 ** 32 - 1;

export function product(sizes: readonly number[]): number {
  return sizes.reduce((total, size) => total * size, 1);
}

/** Cell count of the cube, from the top-level `size` or else `dimension.size`. */
export function cubeSize(doc: JsonStatDocument): number {
  const nested = doc.dimension;
  const candidates = [
    doc.size,
    nested && typeof nested === 'object' && !Array.isArray(nested) ? nested.size : undefined
  ];
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const parsed = dimensionSizesSchema.safeParse(candidate);
    if (parsed.success) return product(parsed.data);
  }
  throw new JsonStatError('MissingSize', 'Cannot rebuild sparse values without a size list', 'size');
}

function parseValues(doc: JsonStatDocument, valueKey: string) {
  if (!hasOwn(doc, valueKey)) {
    throw new JsonStatError('MalformedDocument', `Document has no ${valueKey} field`, valueKey);
  }
  const parsed = valuesSchema.safeParse(doc[valueKey]);
  if (!parsed.success) {
    throw new JsonStatError(
      'MalformedDocument',
      `Field ${valueKey} must be a list of values or a mapping of flat index to value`,
      valueKey
    );
  }
  return parsed.data;
}

export function resolveValues(doc: JsonStatDocument, valueKey = 'value'): Cell[] {
  const values = parseValues(doc, valueKey);
  if (values.kind === 'list') return values.items;

  const total = cubeSize(doc);
  if (total > MAX_ARRAY_LENGTH) {
    throw new JsonStatError(
      'ShapeMismatch',
      `Dimensions describe ${total} cells, too many to expand ${valueKey} densely`,
      valueKey
    );
  }
  const dense = new Array<Cell>(total).fill(null);
  for (const [key, value] of Object.entries(values.entries)) {
    const offset = Number(key);
    if (!FLAT_INDEX.test(key) || offset >= total) {
      throw new JsonStatError('IndexOutOfRange', `Sparse value index ${key} is outside 0..${total - 1}`, key);
    }
    dense[offset] = value;
  }
  return dense;
}

/** Value at one flat index, read without expanding sparse values. */
export function valueAt(doc: JsonStatDocument, index: number, valueKey = 'value'): Cell {
  const values = parseValues(doc, valueKey);
  const count = values.kind === 'list' ? values.items.length : cubeSize(doc);
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new JsonStatError('IndexOutOfRange', `Flat index ${index} is beyond ${count} values`, index);
  }
  if (values.kind === 'list') return values.items[index];
  const key = String(index);
  return hasOwn(values.entries, key) ? values.entries[key] : null;
}
