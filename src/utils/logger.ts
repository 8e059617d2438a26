import { LoggerService, LogLevel } from '@nestjs/common';

export type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  verbose: 0,
  debug: 1,
  log: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolves the minimum level to print from `LOG_LEVEL`.
 * `silent` suppresses every entry; unknown values fall back to `log`.
 */
export function resolveLogThreshold(value = process.env.LOG_LEVEL): number {
  if (value === 'silent') {
    return Number.POSITIVE_INFINITY;
  }
  if (value && isLogLevel(value)) {
    return LEVEL_ORDER[value];
  }
  return LEVEL_ORDER.log;
}

/**
 * Structured logger that prints one JSON object per line.
 *
 * @remarks
 * Every entry carries the timestamp, level, context (usually the owning
 * class name) and message, with the metadata object merged at the top level
 * so log processors can filter on it directly.
 *
 * @example
 * ```typescript
 * const logger = new JSONLogger('LinksRepository');
 * logger.log('Link deactivated', { linkId: 12 });
 * logger.error('Insert failed', error.stack, { table: 'links' });
 * ```
 */
export class JSONLogger implements LoggerService {
  private threshold = resolveLogThreshold();

  constructor(private readonly context = 'Application') {}

  log(message: string, metadata?: LogMetadata): void {
    this.write('log', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, trace?: string, metadata?: LogMetadata): void {
    this.write('error', message, {
      ...metadata,
      ...(trace ? { trace } : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  verbose(message: string, metadata?: LogMetadata): void {
    this.write('verbose', message, metadata);
  }

  fatal(message: string, metadata?: LogMetadata): void {
    this.write('fatal', message, metadata);
  }

  setLogLevels(levels: LogLevel[]): void {
    const lowest = Math.min(...levels.map((level) => LEVEL_ORDER[level]));
    this.threshold = Number.isFinite(lowest)
      ? lowest
      : Number.POSITIVE_INFINITY;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...metadata,
    };

    const line = `${JSON.stringify(entry)}\n`;
    if (level === 'error' || level === 'fatal') {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  }
}
