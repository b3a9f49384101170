import { describe, expect, it } from 'vitest';
import { assertNaming, generateRows, odometer, rowCount } from '../src/jsonstat/rows.js';
import type { ResolvedCategory } from '../src/types.js';

function categories(prefix: string, count: number): ResolvedCategory[] {
  return Array.from({ length: count }, (_, position) => ({
    id: `${prefix}${position}`,
    label: `${prefix.toUpperCase()} ${position}`,
    position
  }));
}

describe('odometer', () => {
  it('varies the last list fastest', () => {
    expect([...odometer([['a', 'b'], ['x', 'y']])]).toEqual([
      ['a', 'x'],
      ['a', 'y'],
      ['b', 'x'],
      ['b', 'y']
    ]);
  });

  it('yields nothing when a list is empty', () => {
    expect([...odometer([['a'], []])]).toEqual([]);
  });

  it('yields one empty combination for no lists', () => {
    expect([...odometer([])]).toEqual([[]]);
  });

  it('handles many dimensions without recursion', () => {
    const lists = Array.from({ length: 60 }, (_, d) => [`c${d}`]);
    const rows = [...odometer(lists)];
    expect(rows).toHaveLength(1);
    expect(rows[0]).toHaveLength(60);
    expect(rows[0][59]).toBe('c59');
  });
});

describe('generateRows', () => {
  const dimensions = [categories('a', 2), categories('b', 3), categories('c', 4)];

  it('yields the product of the cardinalities', () => {
    const rows = [...generateRows(dimensions, 'id')];
    expect(rows).toHaveLength(24);
    expect(rowCount(dimensions)).toBe(24);
    expect(rows[0]).toEqual(['a0', 'b0', 'c0']);
    expect(rows[1]).toEqual(['a0', 'b0', 'c1']);
    expect(rows[4]).toEqual(['a0', 'b1', 'c0']);
    expect(rows[23]).toEqual(['a1', 'b2', 'c3']);
  });

  it('uses labels in label naming', () => {
    const [first] = generateRows(dimensions, 'label');
    expect(first).toEqual(['A 0', 'B 0', 'C 0']);
  });

  it('can be iterated again from the start', () => {
    const first = [...generateRows(dimensions, 'id')];
    const second = [...generateRows(dimensions, 'id')];
    expect(second).toEqual(first);
  });
});

describe('assertNaming', () => {
  it('accepts label and id', () => {
    expect(() => assertNaming('label')).not.toThrow();
    expect(() => assertNaming('id')).not.toThrow();
  });

  it('rejects anything else with InvalidNamingMode', () => {
    let caught: unknown;
    try {
      assertNaming('code');
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: 'InvalidNamingMode', subject: 'code' });
  });
});
