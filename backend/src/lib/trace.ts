import { TraceLevel, type TraceEntry } from '@orgld/shared';
import { config } from './config.js';
import { logger as rootLogger, type Logger } from './logger.js';

type TraceLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

const PINO_LEVEL: Record<TraceLevel, 'info' | 'warn' | 'error' | 'debug'> = {
  INFO: 'info',
  OK: 'info',
  WARN: 'warn',
  ERROR: 'error',
  HTTP: 'debug',
};

/**
 * Human-readable session log. Keeps the most recent entries only and
 * mirrors each one to the structured logger.
 */
export class Trace {
  private readonly items: TraceEntry[];

  constructor(
    entries: TraceEntry[] = [],
    private readonly limit: number = config.session.traceLimit,
    private readonly log: TraceLogger = rootLogger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.items = entries.slice(-limit);
  }

  get entries(): TraceEntry[] {
    return [...this.items];
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.push(TraceLevel.INFO, message, context);
  }

  ok(message: string, context?: Record<string, unknown>): void {
    this.push(TraceLevel.OK, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.push(TraceLevel.WARN, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.push(TraceLevel.ERROR, message, context);
  }

  http(message: string, context?: Record<string, unknown>): void {
    this.push(TraceLevel.HTTP, message, context);
  }

  clear(): void {
    this.items.length = 0;
  }

  lines(): string[] {
    return this.items.map(formatTraceEntry);
  }

  private push(level: TraceLevel, message: string, context?: Record<string, unknown>): void {
    this.items.push({ at: this.now().toISOString(), level, message });
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }
    this.log[PINO_LEVEL[level]]({ trace: level, ...context }, message);
  }
}

// "[HH:MM:SS] LEVEL message", UTC
export function formatTraceEntry(entry: TraceEntry): string {
  return `[${entry.at.slice(11, 19)}] ${entry.level} ${entry.message}`;
}
