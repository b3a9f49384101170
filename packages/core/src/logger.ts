export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

// stdout carries the MCP stdio transport, so everything goes to stderr.
export function createConsoleLogger(scope: string, minLevel: LogLevel = 'info'): Logger {
  const threshold = LEVELS.indexOf(minLevel);

  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVELS.indexOf(level) < threshold) return;
    const line = `[${scope}] ${message}`;
    if (fields && Object.keys(fields).length) {
      console.error(line, JSON.stringify(fields));
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
