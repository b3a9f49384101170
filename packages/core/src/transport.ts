/**
 * Dual transport support for MCP servers.
 * Supports both stdio (local) and Streamable HTTP (remote/Docker).
 *
 * Environment variables:
 *   TRANSPORT: 'stdio' (default) or 'http'
 *   PORT: HTTP port (default: 8005)
 *   HOST: HTTP host (default: '0.0.0.0')
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Request, Response } from 'express';
import { describeError } from './errors.js';
import { createConsoleLogger, type Logger } from './logger.js';

export type TransportKind = 'stdio' | 'http';

export interface TransportConfig {
  /** Default: process.env.TRANSPORT || 'stdio' */
  transport?: TransportKind;
  /** Default: process.env.PORT || 8005 */
  port?: number;
  /** Default: process.env.HOST || '0.0.0.0' */
  host?: string;
  serverName?: string;
  logger?: Logger;
}

export function transportFromEnv(value: string | undefined): TransportKind {
  return value === 'http' ? 'http' : 'stdio';
}

export async function startServer(server: McpServer, config: TransportConfig = {}): Promise<void> {
  const transport = config.transport ?? transportFromEnv(process.env.TRANSPORT);
  const serverName = config.serverName || 'mcp-server';
  const logger = config.logger ?? createConsoleLogger(serverName);

  if (transport === 'http') {
    await startHttpServer(server, config, serverName, logger);
  } else {
    await startStdioServer(server, serverName, logger);
  }
}

async function startStdioServer(server: McpServer, serverName: string, logger: Logger): Promise<void> {
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${serverName} running on stdio`);
}

async function startHttpServer(
  server: McpServer,
  config: TransportConfig,
  serverName: string,
  logger: Logger
): Promise<void> {
  const { StreamableHTTPServerTransport } = await import('@modelcontextprotocol/sdk/server/streamableHttp.js');
  const express = (await import('express')).default;

  const port = config.port || parseInt(process.env.PORT || '8005', 10);
  const host = config.host || process.env.HOST || '0.0.0.0';

  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      transport: 'http',
      timestamp: new Date().toISOString()
    });
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    // Stateless: one transport per request.
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });

    res.on('close', () => {
      transport.close().catch(error => logger.warn('Failed to close transport', { reason: describeError(error) }));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('MCP request failed', { reason: describeError(error) });
      if (!res.headersSent) {
        res.status(500).json({ error: 'INTERNAL_ERROR', message: describeError(error) });
      }
    }
  });

  app.listen(port, host, () => {
    logger.info(`${serverName} running on http://${host}:${port}`);
    logger.info(`  MCP endpoint: http://${host}:${port}/mcp`);
    logger.info(`  Health check: http://${host}:${port}/health`);
  });
}
