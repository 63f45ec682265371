import pino, { type Logger as PinoInstance } from 'pino';
import { LOG_LEVELS, type LogLevel, type Logger } from '../types/index.js';
import { currentTraceId } from '../observability/trace.js';

export interface PinoLoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

function traced(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  const traceId = currentTraceId();
  if (!traceId) return meta;
  return meta ? { traceId, ...meta } : { traceId };
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.TQA_LOG_LEVEL;
  return LOG_LEVELS.find((l) => l === raw);
}

export class PinoLogger implements Logger {
  private readonly log: PinoInstance;

  constructor(options: PinoLoggerOptions = {}) {
    const level = options.level ?? levelFromEnv() ?? 'info';
    const pretty = options.pretty ?? (process.env.TQA_LOG_PRETTY === '1');

    const transport = pretty
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } })
      : undefined;

    this.log = pino(
      {
        level,
        name: options.name ?? 'transcript-qa',
        redact: {
          paths: [
            '*.password',
            '*.secret',
            '*.token',
            '*.apiKey',
            '*.apikey',
            'apiKey',
            'headers.authorization',
            'headers["api-key"]'
          ],
          censor: '***'
        }
      },
      transport
    );
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log.trace(traced(meta), message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log.debug(traced(meta), message);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log.info(traced(meta), message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log.warn(traced(meta), message);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log.error(traced(meta), message);
  }
}
