import { readFileSync } from 'fs';
import { parse } from 'yaml';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Reads a YAML file. A missing or unreadable file yields `{}` so callers
 * fall back to their defaults; the schema check is theirs.
 */
export function loadYamlConfig(filePath: string, logger: Logger): unknown {
  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed: unknown = parse(content);
    return parsed ?? {};
  } catch (error) {
    logger.warn(`Failed to load config file ${filePath}`, { reason: describeError(error) });
    return {};
  }
}
