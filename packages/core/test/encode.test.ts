import { describe, expect, it } from 'vitest';
import { decode } from '../src/jsonstat/decode.js';
import { encode, encodeAll, encodeDimension } from '../src/jsonstat/encode.js';
import { pointLookup } from '../src/jsonstat/radix.js';
import type { Cell, Table } from '../src/types.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

const table: Table = {
  columns: ['region', 'year', 'value'],
  rows: [
    ['north', 2020, 1.5],
    ['north', 2021, 2],
    ['south', 2020, null],
    ['south', 2021, 4]
  ]
};

const regionDimension = {
  label: 'region',
  category: {
    index: { north: 0, south: 1 },
    label: { north: 'north', south: 'south' }
  }
};
const yearDimension = {
  label: 'year',
  category: {
    index: { '2020': 0, '2021': 1 },
    label: { '2020': '2020', '2021': '2021' }
  }
};

describe('encode', () => {
  it('builds a 2.0 dataset by default', () => {
    expect(encode(table)).toEqual({
      version: '2.0',
      class: 'dataset',
      id: ['region', 'year'],
      size: [2, 2],
      dimension: { region: regionDimension, year: yearDimension },
      value: [1.5, 2, null, 4]
    });
  });

  it('wraps a 1.3 dataset under dataset<N>', () => {
    expect(encode(table, { version: '1.3', datasetNumber: 3 })).toEqual({
      dataset3: {
        dimension: {
          region: regionDimension,
          year: yearDimension,
          id: ['region', 'year'],
          size: [2, 2]
        },
        value: [1.5, 2, null, 4]
      }
    });
  });

  it('places values by their categories whatever the row order', () => {
    const shuffled: Table = {
      columns: ['region', 'year', 'value'],
      rows: [
        ['south', '2021', 4],
        ['north', '2020', 1],
        ['south', '2020', 3],
        ['north', '2021', 2]
      ]
    };
    const doc = encode(shuffled);
    expect(doc.value).toEqual([4, 3, 2, 1]);
    expect(decode(doc, { naming: 'id' }).rows).toEqual([
      ['south', '2021', 4],
      ['south', '2020', 3],
      ['north', '2021', 2],
      ['north', '2020', 1]
    ]);
  });

  it('fills missing combinations with null', () => {
    const partial: Table = {
      columns: ['region', 'year', 'value'],
      rows: [
        ['north', '2020', 1],
        ['south', '2021', 2]
      ]
    };
    expect(encode(partial).value).toEqual([1, null, null, 2]);
  });

  it('writes NaN as null', () => {
    const withNaN: Table = { columns: ['year', 'value'], rows: [['2020', NaN], ['2021', 3]] };
    expect(encode(withNaN).value).toEqual([null, 3]);
  });

  it('uses a custom value column', () => {
    const doc = encode({ columns: ['year', 'amount'], rows: [['2020', 7]] }, { valueKey: 'amount' });
    expect(doc.amount).toEqual([7]);
    expect(doc.id).toEqual(['year']);
  });

  it('fails with DuplicateColumn for a repeated column', () => {
    const duplicated: Table = { columns: ['region', 'region', 'value'], rows: [['north', 'south', 1]] };
    expect(catchError(() => encode(duplicated))).toMatchObject({ kind: 'DuplicateColumn', subject: 'region' });
  });

  it('fails with NoValueColumn when the value column is missing', () => {
    const noValue: Table = { columns: ['region', 'amount'], rows: [['north', 1]] };
    expect(catchError(() => encode(noValue))).toMatchObject({ kind: 'NoValueColumn', subject: 'value' });
  });

  it('fails with DuplicateRow for a repeated composite key', () => {
    const repeated: Table = {
      columns: ['region', 'value'],
      rows: [['north', 1], ['south', 2], ['north', 3]]
    };
    expect(catchError(() => encode(repeated))).toMatchObject({ kind: 'DuplicateRow', subject: 2 });
  });

  it('fails with MalformedTable for a short row or a null category', () => {
    expect(catchError(() => encode({ columns: ['region', 'value'], rows: [['north']] }))).toMatchObject({
      kind: 'MalformedTable',
      subject: 0
    });
    expect(catchError(() => encode({ columns: ['region', 'value'], rows: [['north', 1], [null, 2]] }))).toMatchObject({
      kind: 'MalformedTable',
      subject: 1
    });
  });

  it('round-trips a row-major table through decode', () => {
    const original: Table = {
      columns: ['sex', 'age', 'value'],
      rows: [
        ['male', 'young', 1],
        ['male', 'old', 2],
        ['female', 'young', 3],
        ['female', 'old', 4]
      ]
    };
    expect(decode(encode(original, { version: '2.0' }), { naming: 'id' })).toEqual(original);
  });
});

describe('encodeAll', () => {
  const second: Table = { columns: ['year', 'value'], rows: [['2020', 1]] };

  it('returns one document per table', () => {
    const documents = encodeAll([table, second]);
    expect(documents).toHaveLength(2);
  });

  it('merges 1.3 datasets into one bundle', () => {
    const bundle = encodeAll([table, second], { version: '1.3', output: 'dict' });
    expect(Object.keys(bundle)).toEqual(['dataset1', 'dataset2']);
  });
});

describe('encodeDimension', () => {
  it('orders categories by the index column', () => {
    const dimensionTable: Table = {
      columns: ['id', 'Region', 'index'],
      rows: [
        ['B', 'Beta', '1'],
        ['A', 'Alpha', 0]
      ]
    };
    expect(encodeDimension(dimensionTable)).toEqual({
      version: '2.0',
      class: 'dimension',
      label: 'Region',
      category: {
        index: ['A', 'B'],
        label: { A: 'Alpha', B: 'Beta' }
      }
    });
  });

  it('keeps row order without an index column', () => {
    const doc = encodeDimension({ columns: ['id', 'Unit'], rows: [['PC', 'Percent'], ['NR', null]] });
    expect(doc.category).toEqual({ index: ['PC', 'NR'], label: { PC: 'Percent', NR: 'NR' } });
  });

  it('rejects an index that is not an integer', () => {
    const bad: Table = { columns: ['id', 'Unit', 'index'], rows: [['PC', 'Percent', 'first']] };
    expect(catchError(() => encodeDimension(bad))).toMatchObject({ kind: 'MalformedTable', subject: 0 });
  });
});

describe('encode edge cases', () => {
  it('encodes a table with no dimensions and no rows as one empty cell', () => {
    const doc = encode({ columns: ['value'], rows: [] });
    expect(doc).toMatchObject({ id: [], size: [], value: [null] });
    expect(decode(doc).rows).toEqual([[null]]);
  });

  it('keeps a zero-sized cube empty', () => {
    expect(encode({ columns: ['region', 'value'], rows: [] })).toMatchObject({ size: [0], value: [] });
  });

  it('rejects layout key names as 1.3 dimensions', () => {
    const named: Table = { columns: ['id', 'year', 'value'], rows: [['x', 2020, 1]] };
    expect(catchError(() => encode(named, { version: '1.3' }))).toMatchObject({
      kind: 'MalformedTable',
      subject: 'id'
    });
    const sized: Table = { columns: ['year', 'size', 'value'], rows: [[2020, 'large', 1]] };
    expect(catchError(() => encode(sized, { version: '1.3' }))).toMatchObject({
      kind: 'MalformedTable',
      subject: 'size'
    });
  });

  it('accepts an id column in a 2.0 dataset', () => {
    const named: Table = { columns: ['id', 'year', 'value'], rows: [['x', 2020, 1]] };
    expect(decode(encode(named), { naming: 'id' }).rows).toEqual([['x', '2020', 1]]);
  });
});

describe('encode with many categories', () => {
  const wide: Table = {
    columns: ['a', 'b', 'c', 'value'],
    rows: Array.from({ length: 2000 }, (_, i): Cell[] => [`a${i}`, `b${i}`, `c${i}`, i])
  };

  it('writes sparse values when the cube is too large to be dense', () => {
    const doc = encode(wide);
    expect(doc.size).toEqual([2000, 2000, 2000]);
    expect(doc.value).toMatchObject({ '0': 0, '4002001': 1, '7999999999': 1999 });
    const value = doc.value;
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      throw new Error('expected a sparse value mapping');
    }
    expect(Object.keys(value)).toHaveLength(2000);
  });

  it('looks values up in the sparse cube', () => {
    const doc = encode(wide);
    expect(pointLookup(doc, { a: 'a7', b: 'b7', c: 'c7' })).toBe(7);
    expect(pointLookup(doc, { a: 'a7', b: 'b8', c: 'c7' })).toBeNull();
  });
});
