export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

export interface LogData {
  event?: string;
  operation?: string;
  error?: unknown;
  stack?: string;
  duration?: number;
  [key: string]: unknown;
}

type LogFn = (...args: unknown[]) => void;

export class Logger {
  constructor(private service: string) {}

  debug(data: LogData): void {
    if (process.env.LOG_LEVEL !== 'debug') return;
    this.log(LogLevel.DEBUG, data, console.log);
  }

  info(data: LogData): void {
    this.log(LogLevel.INFO, data, console.log);
  }

  warn(data: LogData): void {
    this.log(LogLevel.WARN, data, console.warn);
  }

  error(data: LogData): void {
    this.log(LogLevel.ERROR, data, console.error);
  }

  private log(level: LogLevel, data: LogData, logFn: LogFn): void {
    const prefix = level === LogLevel.INFO ? `[${this.service}]` : `[${this.service}] ${level}`;

    const { event, operation, error, stack, duration, ...rest } = data;

    let message = '';
    if (event) {
      message = event.replace(/_/g, ' ');
    }
    if (operation) {
      message = `${operation}${message ? ' - ' + message : ''}`;
    }

    // Only non-empty fields make it into the details object
    const details: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(rest)) {
      if (value !== undefined && value !== null) {
        details[key] = value;
      }
    }
    const hasDetails = Object.keys(details).length > 0;

    if (error !== undefined) {
      logFn(`${prefix} ${message || 'Error'}:`, error instanceof Error ? error.message : error);
      const trace = stack ?? (error instanceof Error ? error.stack : undefined);
      if (trace) {
        logFn(trace);
      }
      if (hasDetails) {
        logFn(`${prefix} Details:`, details);
      }
      return;
    }

    const summaryParts: string[] = [];
    if (message) summaryParts.push(message);
    if (duration !== undefined) summaryParts.push(`(${duration}ms)`);

    if (hasDetails) {
      logFn(`${prefix} ${summaryParts.join(' ')}`, details);
    } else {
      logFn(`${prefix} ${summaryParts.join(' ')}`);
    }
  }
}
