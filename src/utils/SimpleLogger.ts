import chalk from 'chalk';
import { currentTraceId } from '../observability/trace.js';
import type { LogLevel, Logger } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4
};

const COLORS: Record<LogLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.blue,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red
};

type Sink = (line: string) => void;

/**
 * Colored one-line logger for interactive commands. Writes to stderr so the answers on
 * stdout stay readable.
 */
export class SimpleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'warn', private readonly sink: Sink = (line) => process.stderr.write(`${line}\n`)) {
    this.threshold = LEVEL_ORDER[level];
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log('trace', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : '';
    const traceId = currentTraceId();
    const scope = traceId ? `${chalk.dim(`[${traceId.slice(0, 8)}]`)} ` : '';
    this.sink(`${COLORS[level](level.toUpperCase().padEnd(5))} ${scope}${message}${suffix}`);
  }
}
