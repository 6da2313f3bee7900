/**
 * Structured logging for cqlgen
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino.Logger type for convenience
export type Logger = pino.Logger;

export interface LogContext {
  table?: string;
  component?: string;
  [key: string]: unknown;
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'cqlgen',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}

// Singleton logger instance
let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(parseLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

// Structured event logging for rendered artifacts
export function logArtifactRendered(
  table: string,
  artifact: 'dao' | 'dto',
  path: string,
  bytes: number
): void {
  getLogger().info(
    {
      event: 'artifact_rendered',
      table,
      artifact,
      path,
      bytes,
    },
    `Rendered ${artifact.toUpperCase()} for ${table}`
  );
}
