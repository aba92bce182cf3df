/**
 * Structured Logger
 *
 * JSON lines with workflow/step context.
 * Child loggers carry their parent's context.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  workflow?: string;
  stepId?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;

  constructor(context: LogContext = {}, level: LogLevel = 'info') {
    this.context = context;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    // Remove undefined values
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined)
    );

    // Serialize errors
    if (cleaned.error instanceof Error) {
      cleaned.error = {
        name: cleaned.error.name,
        message: cleaned.error.message,
        stack: cleaned.error.stack,
      };
    }

    console.log(JSON.stringify(cleaned));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level);
  }
}

// =============================================================================
// SILENT LOGGER (tests, embedding)
// =============================================================================

export class SilentLogger implements Logger {
  info(_context: LogContext, _message: string): void {}
  warn(_context: LogContext, _message: string): void {}
  error(_context: LogContext, _message: string): void {}
  debug(_context: LogContext, _message: string): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'milestone-engine' },
    options?.level ?? 'info'
  );
}
