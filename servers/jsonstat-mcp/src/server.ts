#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createConsoleLogger, createFetcher, startServer } from '@jsonstat-kit/core';

import { loadServerConfig } from './config.js';
import type { ToolContext } from './context.js';
import { toTable, toTableSchema } from './tools/to_table.js';
import { fromTable, fromTableSchema } from './tools/from_table.js';
import { getValue, getValueSchema } from './tools/get_value.js';
import { describeDocument, describeSchema } from './tools/describe.js';
import { listCollection, listCollectionSchema } from './tools/list_collection.js';

const logger = createConsoleLogger('jsonstat-mcp');
const config = loadServerConfig(logger);

const context: ToolContext = {
  config,
  logger,
  fetcher: createFetcher({
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
    logger
  })
};

const server = new McpServer({
  name: 'jsonstat-mcp',
  version: '0.1.0'
});

// Tools that may fetch a remote document
const readOnlyAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true
};

const localAnnotations = { ...readOnlyAnnotations, openWorldHint: false };

server.tool(
  'jsonstat_to_table',
  'Decode a JSON-stat dataset or dimension (URL or JSON text) into a flat table',
  toTableSchema.shape,
  readOnlyAnnotations,
  async (params) => toTable(toTableSchema.parse(params), context)
);

server.tool(
  'jsonstat_from_table',
  'Encode a flat table (dimension columns plus one value column) as JSON-stat',
  fromTableSchema.shape,
  localAnnotations,
  async (params) => fromTable(fromTableSchema.parse(params), context)
);

server.tool(
  'jsonstat_get_value',
  'Look up one cube value by its category per dimension',
  getValueSchema.shape,
  readOnlyAnnotations,
  async (params) => getValue(getValueSchema.parse(params), context)
);

server.tool(
  'jsonstat_describe',
  'Summarise a JSON-stat document: class, dimensions, categories and value count',
  describeSchema.shape,
  readOnlyAnnotations,
  async (params) => describeDocument(describeSchema.parse(params), context)
);

server.tool(
  'jsonstat_list_collection',
  'List the items linked from a JSON-stat collection',
  listCollectionSchema.shape,
  readOnlyAnnotations,
  async (params) => listCollection(listCollectionSchema.parse(params), context)
);

server.server.onerror = (error) => logger.error('Server error', { reason: error.message });
process.on('SIGINT', async () => {
  await server.close();
  process.exit(0);
});

startServer(server, { serverName: 'jsonstat-mcp', logger }).catch((error) => {
  logger.error('fatal', { reason: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
