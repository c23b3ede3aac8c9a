/**
 * Diagnostic logging for the orchestration core.
 *
 * A Logger is created once from the service configuration and handed to every
 * component through the AppContext; namespaces are derived with `child()`.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Free-form context attached to a log line. `sessionId`, `agent`, `tool` and
 * `event` are lifted to top-level fields in structured output.
 */
export interface LogContext {
  sessionId?: string;
  agent?: string;
  tool?: string;
  event?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevelName;
  structured?: boolean;
  namespace?: string;
}

const LIFTED_KEYS = ['sessionId', 'agent', 'tool', 'event', 'error'];

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export class Logger {
  private readonly logLevel: LogLevel;
  private readonly levelName: LogLevelName;
  private readonly namespace?: string;
  private readonly structured: boolean;

  constructor(options: LoggerOptions = {}) {
    this.levelName = options.level ?? 'info';
    this.logLevel = LEVEL_BY_NAME[this.levelName];
    this.structured = options.structured ?? false;
    this.namespace = options.namespace;
  }

  /**
   * Logger that drops everything
   */
  static silent(): Logger {
    return new SilentLogger();
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (this.structured) {
      const rest = context
        ? Object.fromEntries(Object.entries(context).filter(([key]) => !LIFTED_KEYS.includes(key)))
        : {};
      const entry = {
        timestamp,
        level,
        sessionId: context?.sessionId,
        agent: context?.agent,
        tool: context?.tool,
        event: context?.event,
        message,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        ...(Object.keys(rest).length > 0 ? { context: rest } : {}),
        ...(context?.['error'] ? { error: context['error'] } : {}),
      };
      return JSON.stringify(entry);
    }
    const prefix = this.namespace ? `[${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level} ${prefix} ${message}${contextStr}`;
  }

  protected shouldLog(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        error:
          error instanceof Error
            ? {
                message: error.message,
                stack: error.stack,
                name: error.name,
              }
            : error,
      };

      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }

  /**
   * Creates a child logger with a nested namespace and the same level and format
   */
  child(namespace: string): Logger {
    const fullNamespace = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger({
      level: this.levelName,
      structured: this.structured,
      namespace: fullNamespace,
    });
  }
}

class SilentLogger extends Logger {
  protected override shouldLog(): boolean {
    return false;
  }

  override child(): Logger {
    return this;
  }
}
