/**
 * Structured JSON-lines logger.
 *
 * Writes to stderr only: stdout belongs to the MCP stdio transport.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Minimum level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Service name included in every line. */
  serviceName?: string;
  sink?: (line: string) => void;
}

export class JsonLogger implements Logger {
  private readonly minLevel: number;
  private readonly serviceName: string;
  private readonly sink: (line: string) => void;

  constructor(options?: LoggerOptions) {
    this.minLevel = LOG_LEVEL_ORDER[options?.level ?? "info"];
    this.serviceName = options?.serviceName ?? "cognitive-memory";
    this.sink = options?.sink ?? ((line: string) => process.stderr.write(line));
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra);
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
      msg: message,
    };
    if (extra) {
      Object.assign(entry, extra);
    }

    this.sink(JSON.stringify(entry) + "\n");
  }
}

/** Drops everything. Default for library callers that did not pass a logger. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
