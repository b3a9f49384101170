import { JsonStatError } from '../errors.js';
import type { Cell, JsonObject, JsonStatDocument, JsonStatVersion, Table } from '../types.js';
import { coerceToInt, coerceToStr } from './coerce.js';
import { flatIndex } from './radix.js';
import { product } from './values.js';

export interface EncodeOptions {
  valueKey?: string;
  version?: JsonStatVersion;
  /** N in the `dataset<N>` key of a 1.3 envelope. */
  datasetNumber?: number;
}

export interface EncodeAllOptions extends Omit<EncodeOptions, 'datasetNumber'> {
  output?: 'list' | 'dict';
}

/** Cubes with more cells than this get their values written sparsely. */
export const MAX_DENSE_CELLS = 1_000_000;

// A 1.3 `dimension` object holds the layout lists beside the descriptors.
const LAYOUT_KEYS = ['id', 'size'];

interface EncodedDimension {
  name: string;
  column: number;
  positions: Map<string, number>;
}

function assertUniqueColumns(columns: readonly string[]): void {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw new JsonStatError('DuplicateColumn', `Column ${column} appears more than once`, column);
    }
    seen.add(column);
  }
}

function categoryKey(cell: Cell, rowNumber: number, column: string): string {
  if (cell === null) {
    throw new JsonStatError('MalformedTable', `Row ${rowNumber} has no category for column ${column}`, rowNumber);
  }
  return coerceToStr(cell);
}

function serializeValue(cell: Cell): Cell {
  return typeof cell === 'number' && Number.isNaN(cell) ? null : cell;
}

function denseValues(cells: Map<number, Cell>, total: number): Cell[] {
  const values = new Array<Cell>(total).fill(null);
  for (const [index, value] of cells) {
    values[index] = value;
  }
  return values;
}

function sparseValues(cells: Map<number, Cell>): JsonObject {
  const values: JsonObject = {};
  for (const index of [...cells.keys()].sort((a, b) => a - b)) {
    values[String(index)] = cells.get(index) ?? null;
  }
  return values;
}

function dimensionEntry(dimension: EncodedDimension): JsonObject {
  const index: JsonObject = {};
  const label: JsonObject = {};
  for (const [key, position] of dimension.positions) {
    index[key] = position;
    label[key] = key;
  }
  return {
    label: dimension.name,
    category: { index, label }
  };
}

/**
 * Encodes a flat table as a JSON-stat dataset. Categories are the unique
 * values of each non-value column in first-seen order; every row's value is
 * written at the flat index of its categories, so row order does not matter.
 */
export function encode(table: Table, options: EncodeOptions = {}): JsonStatDocument {
  const valueKey = options.valueKey ?? 'value';
  const version = options.version ?? '2.0';
  const { columns, rows } = table;

  assertUniqueColumns(columns);
  const valueColumn = columns.indexOf(valueKey);
  if (valueColumn < 0) {
    throw new JsonStatError('NoValueColumn', `Table has no ${valueKey} column`, valueKey);
  }

  const dimensions: EncodedDimension[] = columns
    .map((name, column) => ({ name, column, positions: new Map<string, number>() }))
    .filter(dimension => dimension.column !== valueColumn);

  if (version === '1.3') {
    const reserved = dimensions.find(dimension => LAYOUT_KEYS.includes(dimension.name));
    if (reserved) {
      throw new JsonStatError(
        'MalformedTable',
        `Column ${reserved.name} cannot be a dimension in a 1.3 dataset`,
        reserved.name
      );
    }
  }

  rows.forEach((row, r) => {
    if (row.length !== columns.length) {
      throw new JsonStatError(
        'MalformedTable',
        `Row ${r} has ${row.length} cells but the table has ${columns.length} columns`,
        r
      );
    }
    for (const dimension of dimensions) {
      const key = categoryKey(row[dimension.column], r, dimension.name);
      if (!dimension.positions.has(key)) {
        dimension.positions.set(key, dimension.positions.size);
      }
    }
  });

  const ids = dimensions.map(dimension => dimension.name);
  const sizes = dimensions.map(dimension => dimension.positions.size);
  const total = product(sizes);
  if (!Number.isSafeInteger(total)) {
    throw new JsonStatError('MalformedTable', `Cube of ${total} cells cannot be indexed`, valueKey);
  }
  const cells = new Map<number, Cell>();

  rows.forEach((row, r) => {
    const indices = dimensions.map(
      dimension => dimension.positions.get(categoryKey(row[dimension.column], r, dimension.name)) ?? -1
    );
    const index = flatIndex(indices, sizes);
    if (cells.has(index)) {
      throw new JsonStatError('DuplicateRow', `Row ${r} repeats the categories of an earlier row`, r);
    }
    cells.set(index, serializeValue(row[valueColumn]));
  });
  const values = total > MAX_DENSE_CELLS ? sparseValues(cells) : denseValues(cells, total);

  const dimension: JsonObject = {};
  for (const entry of dimensions) {
    dimension[entry.name] = dimensionEntry(entry);
  }

  if (version === '2.0') {
    return {
      version: '2.0',
      class: 'dataset',
      id: ids,
      size: sizes,
      dimension,
      [valueKey]: values
    };
  }

  return {
    [`dataset${options.datasetNumber ?? 1}`]: {
      dimension: { ...dimension, id: ids, size: sizes },
      [valueKey]: values
    }
  };
}

export function encodeAll(tables: readonly Table[], options: EncodeAllOptions & { output: 'dict' }): JsonStatDocument;
export function encodeAll(tables: readonly Table[], options?: EncodeAllOptions): JsonStatDocument[] | JsonStatDocument;
export function encodeAll(tables: readonly Table[], options: EncodeAllOptions = {}): JsonStatDocument[] | JsonStatDocument {
  const { output = 'list', ...encodeOptions } = options;
  const documents = tables.map((table, i) => encode(table, { ...encodeOptions, datasetNumber: i + 1 }));
  if (output === 'list') return documents;

  // Later datasets win on key collisions, which only 2.0 envelopes can have.
  const merged: JsonStatDocument = {};
  for (const document of documents) {
    for (const [key, value] of Object.entries(document)) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Encodes a table with an `id` column, an optional `index` column and one
 * label column as a 2.0 dimension document.
 */
export function encodeDimension(table: Table): JsonStatDocument {
  const { columns, rows } = table;
  assertUniqueColumns(columns);

  const idColumn = columns.indexOf('id');
  if (idColumn < 0) {
    throw new JsonStatError('MalformedTable', 'Dimension table has no id column', 'id');
  }
  const indexColumn = columns.indexOf('index');
  const labelColumns = columns.filter(column => column !== 'id' && column !== 'index');
  if (labelColumns.length !== 1) {
    throw new JsonStatError(
      'MalformedTable',
      `Dimension table needs exactly one label column, found ${labelColumns.length}`,
      labelColumns.join(',')
    );
  }
  const [labelName] = labelColumns;
  const labelColumn = columns.indexOf(labelName);

  const categories = rows.map((row, r) => {
    const id = categoryKey(row[idColumn], r, 'id');
    const labelCell = row[labelColumn];
    let position = r;
    if (indexColumn >= 0) {
      const cell = row[indexColumn];
      const coerced = cell === null ? null : coerceToInt(cell);
      if (typeof coerced !== 'number' || !Number.isInteger(coerced)) {
        throw new JsonStatError('MalformedTable', `Row ${r} has a non-integer index`, r);
      }
      position = coerced;
    }
    return { id, label: labelCell === null ? id : coerceToStr(labelCell), position };
  });
  categories.sort((a, b) => a.position - b.position);

  const label: JsonObject = {};
  for (const category of categories) {
    label[category.id] = category.label;
  }

  return {
    version: '2.0',
    class: 'dimension',
    label: labelName,
    category: {
      index: categories.map(category => category.id),
      label
    }
  };
}
