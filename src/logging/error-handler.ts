/**
 * Error Logging and Handling System
 * Centralized log records for one agent run. Records are kept in memory and
 * the ones at or above the threshold are written to the sink (stderr by
 * default, stdout belongs to the agent sections).
 */

export enum ErrorLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: Record<ErrorLevel, number> = {
  [ErrorLevel.DEBUG]: 10,
  [ErrorLevel.INFO]: 20,
  [ErrorLevel.WARN]: 30,
  [ErrorLevel.ERROR]: 40,
  [ErrorLevel.FATAL]: 50
};

export interface ErrorLog {
  level: ErrorLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export interface ErrorHandlerOptions {
  level?: ErrorLevel;
  /** Print stack traces of logged errors. */
  stacks?: boolean;
  sink?: (line: string) => void;
  clock?: () => Date;
}

export function toErrorLevel(level: 'debug' | 'info' | 'warn' | 'error'): ErrorLevel {
  switch (level) {
    case 'debug':
      return ErrorLevel.DEBUG;
    case 'info':
      return ErrorLevel.INFO;
    case 'warn':
      return ErrorLevel.WARN;
    case 'error':
      return ErrorLevel.ERROR;
  }
}

export class ErrorHandler {
  private logs: ErrorLog[] = [];
  private threshold: ErrorLevel;
  private stacks: boolean;
  private sink: (line: string) => void;
  private clock: () => Date;

  constructor(options: ErrorHandlerOptions = {}) {
    this.threshold = options.level || ErrorLevel.WARN;
    this.stacks = options.stacks || false;
    this.sink = options.sink || ((line) => process.stderr.write(`${line}\n`));
    this.clock = options.clock || (() => new Date());
  }

  log(level: ErrorLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorLog: ErrorLog = {
      level,
      message,
      timestamp: this.clock(),
      stack: error?.stack,
      context
    };
    this.logs.push(errorLog);
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold]) {
      this.outputLog(errorLog);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.ERROR, message, error, context);
  }

  private outputLog(log: ErrorLog): void {
    let logMessage = `[${log.timestamp.toISOString()}] ${log.level}: ${log.message}`;
    if (log.context && Object.keys(log.context).length > 0) {
      logMessage += ` ${JSON.stringify(log.context)}`;
    }
    this.sink(logMessage);
    if (this.stacks && log.stack) {
      this.sink(log.stack);
    }
  }

  getLogs(level?: ErrorLevel): ErrorLog[] {
    if (level) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }
}
