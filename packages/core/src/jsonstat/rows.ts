import { JsonStatError } from '../errors.js';
import type { Naming, ResolvedCategory } from '../types.js';

export function assertNaming(naming: string): asserts naming is Naming {
  if (naming !== 'label' && naming !== 'id') {
    throw new JsonStatError('InvalidNamingMode', `naming must be "label" or "id", got "${naming}"`, naming);
  }
}

export function rowCount(lists: ReadonlyArray<ReadonlyArray<unknown>>): number {
  return lists.reduce((total, list) => total * list.length, 1);
}

/**
 * Every combination of one item per list, first list outermost and last
 * list fastest. Counters are carried like an odometer, so the number of
 * lists is not bounded by stack depth.
 */
export function* odometer<T>(lists: ReadonlyArray<ReadonlyArray<T>>): Generator<T[]> {
  if (lists.some(list => list.length === 0)) return;

  const counters = lists.map(() => 0);
  while (true) {
    yield counters.map((counter, d) => lists[d][counter]);

    let d = lists.length - 1;
    for (; d >= 0; d--) {
      counters[d]++;
      if (counters[d] < lists[d].length) break;
      counters[d] = 0;
    }
    if (d < 0) return;
  }
}

export function generateRows(
  dimensions: ReadonlyArray<ReadonlyArray<ResolvedCategory>>,
  naming: Naming = 'label'
): Generator<string[]> {
  assertNaming(naming);
  const names = dimensions.map(categories =>
    categories.map(category => (naming === 'label' ? category.label : category.id))
  );
  return odometer(names);
}
