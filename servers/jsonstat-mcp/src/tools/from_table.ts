import { z } from 'zod';
import { encode } from '@jsonstat-kit/core';
import { errorResult, jsonResult, type ToolContext, type ToolResult } from '../context.js';

const cellSchema = z.union([z.string(), z.number(), z.null()]);

export const fromTableSchema = z.object({
  columns: z.array(z.string()).min(1).describe('Column names: one per dimension plus the value column'),
  rows: z.array(z.array(cellSchema)).describe('Rows of cells in column order'),
  valueKey: z.string().min(1).optional().describe('Name of the value column (default: value)'),
  version: z.enum(['1.3', '2.0']).optional().describe('JSON-stat version of the output (default: 2.0)')
});

export type FromTableParams = z.infer<typeof fromTableSchema>;

export async function fromTable(params: FromTableParams, context: ToolContext): Promise<ToolResult> {
  const { config } = context;
  try {
    const document = encode(
      { columns: params.columns, rows: params.rows },
      {
        valueKey: params.valueKey ?? config.valueKey,
        version: params.version ?? config.version
      }
    );
    return jsonResult(document);
  } catch (error) {
    return errorResult(error, 'jsonstat_from_table', context);
  }
}
