import { z } from 'zod';
import {
  collectionItems,
  dimensionLayout,
  dimensionName,
  documentClass,
  resolveDimension,
  resolveValues,
  toDocument,
  type JsonStatDocument
} from '@jsonstat-kit/core';
import { errorResult, jsonResult, loadSource, type ToolContext, type ToolResult } from '../context.js';

export const describeSchema = z.object({
  source: z.string().min(1).describe('URL of a JSON-stat document, or the JSON text itself'),
  valueKey: z.string().min(1).optional().describe('Name of the value field (default: value)')
});

export type DescribeParams = z.infer<typeof describeSchema>;

function textField(document: JsonStatDocument, key: string): string | undefined {
  const value = document[key];
  return typeof value === 'string' ? value : undefined;
}

function describeDataset(document: JsonStatDocument, valueKey: string) {
  const { ids, sizes } = dimensionLayout(document);
  return {
    label: textField(document, 'label'),
    dimensions: ids.map((id, d) => ({
      id,
      label: dimensionName(document, id, 'label'),
      size: sizes[d],
      categories: resolveDimension(document, id, 'label')
    })),
    valueCount: resolveValues(document, valueKey).length
  };
}

export async function describeDocument(params: DescribeParams, context: ToolContext): Promise<ToolResult> {
  const valueKey = params.valueKey ?? context.config.valueKey;
  try {
    const document = await loadSource(params.source, context);
    const cls = documentClass(document);

    if (cls === 'collection') {
      return jsonResult({ class: cls, label: textField(document, 'label'), itemCount: collectionItems(document).length });
    }
    if (cls === 'dimension') {
      const label = textField(document, 'label') || 'label';
      return jsonResult({ class: cls, label, categories: resolveDimension(document, label, 'label') });
    }
    // 1.x bundles hold several named datasets.
    if (document.class === undefined && document.dimension === undefined) {
      return jsonResult({
        class: cls,
        datasets: Object.keys(document).map(name => ({
          name,
          ...describeDataset(toDocument(document[name], name), valueKey)
        }))
      });
    }
    return jsonResult({ class: cls, ...describeDataset(document, valueKey) });
  } catch (error) {
    return errorResult(error, 'jsonstat_describe', context);
  }
}
