import { z } from 'zod';
import type { Cell, JsonValue, Table } from '../types.js';
import { coerceToStr } from './coerce.js';

/**
 * JSON-stat carries several fields as "either an ordered list or a keyed
 * mapping" (`category.index`, `value`). Both shapes are parsed into this
 * tagged variant so callers switch on `kind` instead of duck typing.
 */
export type OrderedOrIndexed<L, M = L> =
  | { kind: 'list'; items: L[] }
  | { kind: 'mapping'; entries: Record<string, M> };

function orderedOrIndexed<L extends z.ZodTypeAny, M extends z.ZodTypeAny>(item: L, entry: M) {
  return z.union([
    z.array(item).transform(
      (items): OrderedOrIndexed<z.output<L>, z.output<M>> => ({ kind: 'list', items })
    ),
    z.record(entry).transform(
      (entries): OrderedOrIndexed<z.output<L>, z.output<M>> => ({ kind: 'mapping', entries })
    )
  ]);
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);

const categoryIdSchema = z.union([z.string(), z.number()]).transform(coerceToStr);

export const cellSchema: z.ZodType<Cell> = z.union([z.number(), z.string(), z.null()]);

export const categorySchema = z.object({
  index: orderedOrIndexed(categoryIdSchema, z.number().int().nonnegative()).optional(),
  label: z.record(categoryIdSchema).optional()
});

export const dimensionDescriptorSchema = z.object({
  label: z.string().optional(),
  category: categorySchema
});

export type CategoryIndex = OrderedOrIndexed<string, number>;
export type DimensionDescriptor = z.infer<typeof dimensionDescriptorSchema>;

export const dimensionIdsSchema = z.array(categoryIdSchema);
export const dimensionSizesSchema = z.array(z.number().int().nonnegative());

export const valuesSchema = orderedOrIndexed(cellSchema, cellSchema);

export const tableSchema: z.ZodType<Table> = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(cellSchema))
});

export const collectionItemSchema = z.object({
  class: z.enum(['dataset', 'dimension', 'collection']),
  href: z.string().min(1),
  label: z.string().optional()
});

export const collectionSchema = z.object({
  link: z.object({
    item: z.array(collectionItemSchema)
  })
});

/** Ordered (id, position) pairs of either index shape. */
export function indexPairs(index: CategoryIndex): Array<[string, number]> {
  if (index.kind === 'list') {
    return index.items.map((id, position): [string, number] => [id, position]);
  }
  return Object.entries(index.entries);
}

export function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}
