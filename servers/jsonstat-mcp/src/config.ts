import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadYamlConfig, type Logger } from '@jsonstat-kit/core';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CONFIG_FILE = join(__dirname, '..', 'jsonstat-mcp.yml');

export const serverConfigSchema = z.object({
  naming: z.enum(['label', 'id']).default('label'),
  version: z.enum(['1.3', '2.0']).default('2.0'),
  valueKey: z.string().min(1).default('value'),
  maxRows: z.number().int().positive().default(200),
  fetch: z.object({
    timeoutMs: z.number().int().positive().default(30000),
    userAgent: z.string().min(1).default('jsonstat-mcp/0.1')
  }).default({})
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export function loadServerConfig(
  logger: Logger,
  filePath = process.env.JSONSTAT_MCP_CONFIG || DEFAULT_CONFIG_FILE
): ServerConfig {
  const raw = loadYamlConfig(filePath, logger);
  const parsed = serverConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Invalid config in ${filePath}, using defaults`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
    return serverConfigSchema.parse({});
  }
  return parsed.data;
}
