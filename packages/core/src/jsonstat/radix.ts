import { JsonStatError } from '../errors.js';
import type { CategoryQuery, Cell, JsonStatDocument } from '../types.js';
import { coerceToStr } from './coerce.js';
import { dimensionDescriptor, dimensionLayout, resolveDimension } from './dimension.js';
import { hasOwn, indexPairs } from './schema.js';
import { product, valueAt } from './values.js';

// Dimension 0 is outermost: its weight is the product of every later size.
export function flatIndex(dimIndices: readonly number[], sizes: readonly number[]): number {
  if (dimIndices.length !== sizes.length) {
    throw new JsonStatError(
      'IndexOutOfRange',
      `Expected ${sizes.length} dimension indices, got ${dimIndices.length}`,
      dimIndices.length
    );
  }

  let weight = 1;
  let index = 0;
  for (let d = sizes.length - 1; d >= 0; d--) {
    const position = dimIndices[d];
    if (!Number.isInteger(position) || position < 0 || position >= sizes[d]) {
      throw new JsonStatError(
        'IndexOutOfRange',
        `Index ${position} is outside dimension ${d} of size ${sizes[d]}`,
        position
      );
    }
    index += position * weight;
    weight *= sizes[d];
  }
  return index;
}

export function unflattenIndex(index: number, sizes: readonly number[]): number[] {
  const total = product(sizes);
  if (!Number.isInteger(index) || index < 0 || index >= total) {
    throw new JsonStatError('IndexOutOfRange', `Flat index ${index} is outside 0..${total - 1}`, index);
  }

  const indices = new Array<number>(sizes.length).fill(0);
  let remainder = index;
  for (let d = sizes.length - 1; d >= 0; d--) {
    indices[d] = remainder % sizes[d];
    remainder = Math.floor(remainder / sizes[d]);
  }
  return indices;
}

function categoryPosition(doc: JsonStatDocument, dimId: string, requested: string | number | undefined): number {
  const { category } = dimensionDescriptor(doc, dimId);
  if (!category.index) {
    if (requested === undefined) return 0;
    // The single category is synthesized from the first label.
    const [only] = resolveDimension(doc, dimId, 'label');
    const key = coerceToStr(requested);
    if (only.id === key || only.label === key) return 0;
    throw new JsonStatError('UnknownCategory', `Category ${key} not found in dimension ${dimId}`, dimId);
  }

  const index = category.index;
  if (requested === undefined) {
    if (indexPairs(index).length === 1) return 0;
    throw new JsonStatError('UnknownCategory', `Query gives no category for dimension ${dimId}`, dimId);
  }

  const find = (id: string): number => {
    if (index.kind === 'list') return index.items.indexOf(id);
    return hasOwn(index.entries, id) ? index.entries[id] : -1;
  };

  const key = coerceToStr(requested);
  let position = find(key);
  if (position < 0 && category.label) {
    const labels = category.label;
    const byLabel = Object.keys(labels).find(id => labels[id] === key);
    if (byLabel !== undefined) position = find(byLabel);
  }
  if (position < 0) {
    throw new JsonStatError('UnknownCategory', `Category ${key} not found in dimension ${dimId}`, dimId);
  }
  return position;
}

/** Per-dimension category positions for a query, in document dimension order. */
export function dimensionIndices(query: CategoryQuery, doc: JsonStatDocument): number[] {
  const { ids } = dimensionLayout(doc);
  return ids.map(id => categoryPosition(doc, id, hasOwn(query, id) ? query[id] : undefined));
}

export interface PointLookupResult {
  value: Cell;
  indices: number[];
  index: number;
}

export function locateValue(doc: JsonStatDocument, query: CategoryQuery, valueKey = 'value'): PointLookupResult {
  const indices = dimensionIndices(query, doc);
  const index = flatIndex(indices, dimensionLayout(doc).sizes);
  return { value: valueAt(doc, index, valueKey), indices, index };
}

export function pointLookup(doc: JsonStatDocument, query: CategoryQuery, valueKey = 'value'): Cell {
  return locateValue(doc, query, valueKey).value;
}
