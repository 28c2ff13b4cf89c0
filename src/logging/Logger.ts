/**
 * Logger - Structured JSON logging for the breaker subsystem
 *
 * One JSON line per entry on the matching console stream, with the emitting
 * component, optional metadata (sensitive fields masked) and formatted errors.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  component: string;
  correlationId?: string;
  metadata?: LogMetadata;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  sensitiveFields: string[];
  maxStackTraceLines: number;
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? 'INFO').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: LoggerConfig) {
    this.config = { ...config, sensitiveFields: [...config.sensitiveFields] };
  }

  /**
   * Create logger configuration from environment variables
   */
  static createConfigFromEnv(
    component: string = 'circuit-breakers',
    env: NodeJS.ProcessEnv = process.env,
  ): LoggerConfig {
    const maxStackLines = parseInt(env.LOG_MAX_STACK_LINES ?? '10', 10);

    return {
      level: parseLogLevel(env.LOG_LEVEL),
      component,
      enableConsole: env.LOG_ENABLE_CONSOLE !== 'false',
      sensitiveFields: (env.LOG_SENSITIVE_FIELDS ?? 'password,secret,token,key,authorization')
        .split(',')
        .map((field) => field.trim())
        .filter((field) => field.length > 0),
      maxStackTraceLines: Number.isFinite(maxStackLines) ? maxStackLines : 10,
    };
  }

  /**
   * Process-wide default logger, used when no logger is injected
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(Logger.createConfigFromEnv());
    }
    return Logger.instance;
  }

  /**
   * Logger sharing this configuration under another component name
   */
  child(component: string): Logger {
    return new Logger({ ...this.config, component });
  }

  private maskSensitiveData(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.maskSensitiveData(item));
    }

    if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
      const masked: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        const lowerKey = key.toLowerCase();
        masked[key] = this.config.sensitiveFields.some((field) =>
          lowerKey.includes(field.toLowerCase()),
        )
          ? '[MASKED]'
          : this.maskSensitiveData(entry);
      }
      return masked;
    }

    return value;
  }

  private formatError(error: Error): LogEntry['error'] {
    const stackLines = error.stack?.split('\n').slice(0, this.config.maxStackTraceLines);
    const code = 'code' in error ? error.code : undefined;

    return {
      name: error.name,
      message: error.message,
      stack: stackLines?.join('\n'),
      code: typeof code === 'string' || typeof code === 'number' ? code : undefined,
    };
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    correlationId?: string,
    metadata?: LogMetadata,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      component: this.config.component,
    };

    if (correlationId) {
      entry.correlationId = correlationId;
    }

    if (metadata) {
      const masked = this.maskSensitiveData(metadata);
      if (masked !== null && typeof masked === 'object' && !Array.isArray(masked)) {
        entry.metadata = { ...masked };
      }
    }

    if (error) {
      entry.error = this.formatError(error);
    }

    return entry;
  }

  private writeLog(level: LogLevel, entry: LogEntry): void {
    if (!this.config.enableConsole) return;

    const line = JSON.stringify(entry);
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    correlationId?: string,
    metadata?: LogMetadata,
    error?: Error,
  ): void {
    if (level < this.config.level) return;
    this.writeLog(level, this.createLogEntry(level, message, correlationId, metadata, error));
  }

  debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, correlationId, metadata);
  }

  info(message: string, correlationId?: string, metadata?: LogMetadata): void {
    this.log(LogLevel.INFO, message, correlationId, metadata);
  }

  warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
    this.log(LogLevel.WARN, message, correlationId, metadata);
  }

  error(message: string, error?: Error, correlationId?: string, metadata?: LogMetadata): void {
    this.log(LogLevel.ERROR, message, correlationId, metadata, error);
  }

  fatal(message: string, error?: Error, correlationId?: string, metadata?: LogMetadata): void {
    this.log(LogLevel.FATAL, message, correlationId, metadata, error);
  }

  getConfig(): LoggerConfig {
    return { ...this.config, sensitiveFields: [...this.config.sensitiveFields] };
  }

  setLogLevel(level: LogLevel): void {
    this.config.level = level;
    this.info(`Log level changed to ${LogLevel[level]}`);
  }
}
