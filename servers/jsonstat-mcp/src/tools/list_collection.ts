import { z } from 'zod';
import { collectionItems } from '@jsonstat-kit/core';
import { errorResult, jsonResult, loadSource, type ToolContext, type ToolResult } from '../context.js';

export const listCollectionSchema = z.object({
  source: z.string().min(1).describe('URL of a JSON-stat collection, or the JSON text itself')
});

export type ListCollectionParams = z.infer<typeof listCollectionSchema>;

export async function listCollection(params: ListCollectionParams, context: ToolContext): Promise<ToolResult> {
  try {
    const document = await loadSource(params.source, context);
    const items = collectionItems(document);
    return jsonResult({
      label: typeof document.label === 'string' ? document.label : undefined,
      items: items.map((item, index) => ({ index, ...item }))
    });
  } catch (error) {
    return errorResult(error, 'jsonstat_list_collection', context);
  }
}
