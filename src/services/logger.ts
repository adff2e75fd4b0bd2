import { InvocationContext } from '@azure/functions';

type LogLevel = 'INFO' | 'ERROR' | 'WARN' | 'DEBUG';

/**
 * Per-invocation logger. Each HTTP function builds one from its
 * InvocationContext and hands it to the dispatcher, the SQL client and the
 * transports, so tool timings, rejected queries and driver failures land in
 * the Functions host log under that invocation.
 */
export class Logger {
  private readonly context?: InvocationContext;

  constructor(context?: InvocationContext) {
    this.context = context;
  }

  /**
   * Writes to the invocation context; falls back to the console when built
   * without one (startup code and tests).
   */
  private logInternal(level: LogLevel, message: string, meta?: unknown): void {
    const logMessage = `[${level}] ${new Date().toISOString()} - ${message}`;
    const metaData = meta ?? '';

    if (this.context) {
      switch (level) {
        case 'INFO':
          this.context.log(logMessage, metaData);
          break;
        case 'ERROR':
          this.context.error(logMessage, metaData);
          break;
        case 'WARN':
          this.context.warn(logMessage, metaData);
          break;
        case 'DEBUG':
          this.context.debug(logMessage, metaData);
          break;
      }
    } else {
      const consoleMethod = level === 'INFO' ? console.log :
                          level === 'ERROR' ? console.error :
                          level === 'WARN' ? console.warn : console.debug;
      consoleMethod(logMessage, metaData);
    }
  }

  info(message: string, meta?: unknown): void {
    this.logInternal('INFO', message, meta);
  }

  error(message: string, error?: unknown): void {
    this.logInternal('ERROR', message, error);
  }

  warn(message: string, meta?: unknown): void {
    this.logInternal('WARN', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    if (process.env.NODE_ENV === 'development') {
      this.logInternal('DEBUG', message, meta);
    }
  }
}
