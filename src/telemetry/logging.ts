/**
 * Client Logging
 *
 * Structured logging for request building and token exchange.
 * Tokens, secrets and signatures never go into a log context.
 */

/**
 * Log level.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

/**
 * Log context fields.
 */
export interface ApiLogContext {
  /** API name from config */
  api?: string;
  /** Endpoint path, without host or query */
  endpoint?: string;
  /** HTTP method */
  method?: string;
  /** Body encoding chosen for the request */
  encoding?: "none" | "form" | "multipart";
  /** Whether a signature was attached */
  signed?: boolean;
  /** Token exchange grant */
  grantType?: string;
  /** HTTP status of a response */
  status?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code */
  errorCode?: string;
  /** Additional fields */
  [key: string]: unknown;
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: ApiLogContext): void;
  debug(message: string, context?: ApiLogContext): void;
  info(message: string, context?: ApiLogContext): void;
  warn(message: string, context?: ApiLogContext): void;
  error(message: string, context?: ApiLogContext): void;

  /**
   * Create child logger with additional context.
   */
  child(context: ApiLogContext): Logger;
}

/**
 * No-op logger implementation.
 */
export const noOpLogger: Logger = {
  trace(): void {},
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
  child(): Logger {
    return noOpLogger;
  },
};

/**
 * Log entry for in-memory logger.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: ApiLogContext;
  timestamp: Date;
}

/**
 * In-memory logger for testing. Children write into the parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly baseContext: ApiLogContext;

  constructor(baseContext: ApiLogContext = {}, entries: LogEntry[] = []) {
    this.baseContext = baseContext;
    this.entries = entries;
  }

  private log(level: LogLevel, message: string, context?: ApiLogContext): void {
    this.entries.push({
      level,
      message,
      context: { ...this.baseContext, ...context },
      timestamp: new Date(),
    });
  }

  trace(message: string, context?: ApiLogContext): void {
    this.log("trace", message, context);
  }

  debug(message: string, context?: ApiLogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: ApiLogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: ApiLogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: ApiLogContext): void {
    this.log("error", message, context);
  }

  child(context: ApiLogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((l) => l.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Logger writing one line per entry to the console: `[LEVEL] message {context}`.
 * Trace and debug go to console.debug.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly baseContext: ApiLogContext;

  constructor(options?: { minLevel?: LogLevel; context?: ApiLogContext }) {
    this.minLevel = options?.minLevel ?? "info";
    this.baseContext = options?.context ?? {};
  }

  trace(message: string, context?: ApiLogContext): void {
    this.write("trace", message, context);
  }

  debug(message: string, context?: ApiLogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: ApiLogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: ApiLogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: ApiLogContext): void {
    this.write("error", message, context);
  }

  child(context: ApiLogContext): Logger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      context: { ...this.baseContext, ...context },
    });
  }

  private write(level: LogLevel, message: string, context?: ApiLogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const fields = Object.entries({ ...this.baseContext, ...context }).filter(
      ([, value]) => value !== undefined
    );
    const suffix = fields.length > 0 ? ` ${JSON.stringify(Object.fromEntries(fields))}` : "";
    const line = `[${level.toUpperCase()}] ${message}${suffix}`;

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}
