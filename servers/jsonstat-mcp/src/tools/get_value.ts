import { z } from 'zod';
import { locateValue } from '@jsonstat-kit/core';
import { errorResult, jsonResult, loadSource, type ToolContext, type ToolResult } from '../context.js';

export const getValueSchema = z.object({
  source: z.string().min(1).describe('URL of a JSON-stat dataset, or the JSON text itself'),
  query: z.record(z.union([z.string(), z.number()]))
    .describe('Dimension id to category id (or label), e.g. {"geo": "SE", "time": "2020"}'),
  valueKey: z.string().min(1).optional().describe('Name of the value field (default: value)')
});

export type GetValueParams = z.infer<typeof getValueSchema>;

export async function getValue(params: GetValueParams, context: ToolContext): Promise<ToolResult> {
  try {
    const document = await loadSource(params.source, context);
    const { value, indices, index } = locateValue(
      document,
      params.query,
      params.valueKey ?? context.config.valueKey
    );
    return jsonResult({
      query: params.query,
      value,
      dimensionIndices: indices,
      flatIndex: index
    });
  } catch (error) {
    return errorResult(error, 'jsonstat_get_value', context);
  }
}
