import { z } from 'zod';
import { documentClass, write } from '@jsonstat-kit/core';
import { errorResult, jsonResult, loadSource, type ToolContext, type ToolResult } from '../context.js';

export const toTableSchema = z.object({
  source: z.string().min(1).describe('URL of a JSON-stat document, or the JSON text itself'),
  naming: z.enum(['label', 'id']).optional().describe('Name columns and categories by label or by id'),
  valueKey: z.string().min(1).optional().describe('Name of the value field and column (default: value)'),
  maxRows: z.number().int().positive().optional().describe('Maximum number of rows to return')
});

export type ToTableParams = z.infer<typeof toTableSchema>;

export async function toTable(params: ToTableParams, context: ToolContext): Promise<ToolResult> {
  const { config } = context;
  try {
    const document = await loadSource(params.source, context);
    const table = write(document, 'table', {
      naming: params.naming ?? config.naming,
      valueKey: params.valueKey ?? config.valueKey
    });
    const maxRows = params.maxRows ?? config.maxRows;

    return jsonResult({
      class: documentClass(document),
      columns: table.columns,
      rows: table.rows.slice(0, maxRows),
      totalRows: table.rows.length,
      truncated: table.rows.length > maxRows
    });
  } catch (error) {
    return errorResult(error, 'jsonstat_to_table', context);
  }
}
