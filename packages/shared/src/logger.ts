import { pino, type Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

// Report text and model output never reach the logs
const REDACTED_PATHS = ['bytes', 'document.bytes', 'extractedText', 'content', 'userMessage'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  return isLogLevel(envLevel) ? envLevel : 'info';
}

export const logger = pino({
  name: 'hemascope',
  level: getLogLevel(),
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}
