export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type Naming = 'label' | 'id';
export type DimensionMode = 'index' | 'label';
export type JsonStatVersion = '1.3' | '2.0';
export type DocumentClass = 'dataset' | 'dimension' | 'collection';

/** One table cell: a category name or a cube value. */
export type Cell = string | number | null;

export interface Table {
  columns: string[];
  rows: Cell[][];
}

export interface ResolvedCategory {
  id: string;
  label: string;
  position: number;
}

export interface DimensionLayout {
  ids: string[];
  sizes: number[];
}

/** Point query: dimension id to category id (or label). */
export type CategoryQuery = Record<string, string | number>;

export interface CollectionItem {
  class: DocumentClass;
  href: string;
  label?: string;
}

/**
 * A deserialized JSON-stat document of any class. 1.x bundles
 * (`{ dataset1: {...} }`) count as datasets.
 */
export type JsonStatDocument = JsonObject;
