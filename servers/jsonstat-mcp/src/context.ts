import {
  FetchError,
  HttpError,
  describeError,
  isJsonStatError,
  read,
  type DocumentFetcher,
  type JsonStatDocument,
  type Logger
} from '@jsonstat-kit/core';
import type { ServerConfig } from './config.js';

export interface ToolContext {
  config: ServerConfig;
  logger: Logger;
  fetcher: DocumentFetcher;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function jsonResult(payload: unknown): ToolResult {
  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify(payload, null, 2)
    }]
  };
}

function errorPayload(error: unknown): Record<string, unknown> {
  if (isJsonStatError(error)) {
    return { error: error.kind, message: error.message, subject: error.subject };
  }
  if (error instanceof HttpError) {
    return { error: error.name, message: error.message, status: error.status, reason: error.reason, url: error.url };
  }
  if (error instanceof FetchError) {
    return { error: error.name, message: error.message, url: error.url };
  }
  if (error instanceof SyntaxError) {
    return { error: 'InvalidJson', message: error.message };
  }
  return { error: 'INTERNAL_ERROR', message: describeError(error) };
}

export function errorResult(error: unknown, tool: string, context: ToolContext): ToolResult {
  const payload = errorPayload(error);
  context.logger.error(`${tool} failed`, payload);
  return { ...jsonResult(payload), isError: true };
}

/** A tool source is either a URL or the JSON text of a document. */
export function loadSource(source: string, context: ToolContext): Promise<JsonStatDocument> {
  return read(source.trim(), { fetcher: context.fetcher });
}
