import { JsonStatError } from '../errors.js';
import type {
  DimensionLayout,
  DimensionMode,
  JsonStatDocument,
  Naming,
  ResolvedCategory
} from '../types.js';
import {
  dimensionDescriptorSchema,
  dimensionIdsSchema,
  dimensionSizesSchema,
  hasOwn,
  indexPairs,
  type DimensionDescriptor
} from './schema.js';

/**
 * True when `id`/`size` are expected at the top level. Only version 2.0
 * and later put them there; older documents nest them under `dimension`.
 */
export function isVersion2(doc: JsonStatDocument): boolean {
  const version = doc.version;
  if (typeof version !== 'string' && typeof version !== 'number') return false;
  const parsed = parseFloat(String(version));
  return Number.isFinite(parsed) && parsed >= 2;
}

function layoutSources(doc: JsonStatDocument): JsonStatDocument[] {
  const nested = doc.dimension;
  const sources: JsonStatDocument[] = [doc];
  if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
    if (isVersion2(doc) || doc.id !== undefined) {
      sources.push(nested);
    } else {
      sources.unshift(nested);
    }
  }
  return sources;
}

export function dimensionLayout(doc: JsonStatDocument): DimensionLayout {
  const sources = layoutSources(doc);

  let ids: string[] | undefined;
  let sizes: number[] | undefined;
  for (const source of sources) {
    if (!ids && source.id !== undefined) {
      const parsed = dimensionIdsSchema.safeParse(source.id);
      if (parsed.success) ids = parsed.data;
    }
    if (!sizes && source.size !== undefined) {
      const parsed = dimensionSizesSchema.safeParse(source.size);
      if (parsed.success) sizes = parsed.data;
    }
  }

  if (!ids) {
    throw new JsonStatError('MalformedDocument', 'Document has no dimension id list', 'id');
  }
  if (!sizes) {
    throw new JsonStatError('MissingSize', 'Document has no dimension size list', 'size');
  }
  if (ids.length !== sizes.length) {
    throw new JsonStatError(
      'MalformedDocument',
      `Dimension id list has ${ids.length} entries but size list has ${sizes.length}`,
      'size'
    );
  }
  return { ids, sizes };
}

export function dimensionDescriptor(doc: JsonStatDocument, dimId: string): DimensionDescriptor {
  let raw: unknown;
  if (hasOwn(doc, 'category')) {
    // A standalone dimension document describes itself.
    raw = doc;
  } else {
    const dimensions = doc.dimension;
    if (!dimensions || typeof dimensions !== 'object' || Array.isArray(dimensions) || !hasOwn(dimensions, dimId)) {
      throw new JsonStatError('MalformedDimension', `Dimension ${dimId} not found in document`, dimId);
    }
    raw = dimensions[dimId];
  }

  const parsed = dimensionDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || 'descriptor'}: ${issue.message}` : 'invalid descriptor';
    throw new JsonStatError('MalformedDimension', `Dimension ${dimId} is malformed (${where})`, dimId);
  }
  return parsed.data;
}

/** Display name of a dimension, falling back to its id when the label is empty. */
export function dimensionName(doc: JsonStatDocument, dimId: string, naming: Naming): string {
  if (naming === 'id') return dimId;
  return dimensionDescriptor(doc, dimId).label || dimId;
}

export function resolveDimension(
  doc: JsonStatDocument,
  dimId: string,
  mode: DimensionMode = 'label'
): ResolvedCategory[] {
  const { category } = dimensionDescriptor(doc, dimId);
  const labels = category.label;

  let pairs: Array<[string, number]>;
  if (category.index) {
    pairs = indexPairs(category.index);
  } else {
    // Constant dimensions often omit the index: one category at position 0.
    const first = labels ? Object.keys(labels)[0] : undefined;
    if (first === undefined) {
      throw new JsonStatError('MalformedDimension', `Dimension ${dimId} has neither category index nor label`, dimId);
    }
    pairs = [[first, 0]];
  }

  const display = mode === 'label' ? labels : undefined;
  return pairs
    .map(([id, position]) => ({
      id,
      label: display && hasOwn(display, id) ? display[id] : id,
      position
    }))
    .sort((a, b) => a.position - b.position);
}

export interface ResolvedDimensions {
  ids: string[];
  names: string[];
  dimensions: ResolvedCategory[][];
}

export function resolveDimensions(doc: JsonStatDocument, naming: Naming): ResolvedDimensions {
  const { ids } = dimensionLayout(doc);
  const mode: DimensionMode = naming === 'label' ? 'label' : 'index';
  return {
    ids,
    names: ids.map(id => dimensionName(doc, id, naming)),
    dimensions: ids.map(id => resolveDimension(doc, id, mode))
  };
}
