/**
 * Structured logging for trials and descriptor interpretation.
 * Entries are kept in memory with the context they were logged under, so
 * tests and the CLI can inspect what a run reported.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogContext {
  trial?: string;
  phase?: string;
  component?: string;
  /** Rendered descriptor the entry is about */
  descriptor?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export type LogSummary = {
  totalEntries: number;
  debugCount: number;
  infoCount: number;
  warnCount: number;
  errorCount: number;
};

const CONSOLE: Record<LogLevel, (message: string) => void> = {
  debug: (message) => console.debug(message),
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

function renderPrefix(context: LogContext | undefined): string {
  if (!context) {
    return "";
  }
  const parts = [
    context.phase && `[${context.phase}]`,
    context.component && `<${context.component}>`,
    context.trial,
    context.descriptor && `(${context.descriptor})`,
  ].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? `${parts.join(" ")}: ` : "";
}

function renderData(data: Record<string, unknown>): string {
  return Object.entries(data)
    .map(([key, value]) => {
      if (key === "duration" && typeof value === "number") return `${key}: ${value}ms`;
      if (Array.isArray(value)) return `${key}: [${value.length} items]`;
      if (typeof value === "object" && value !== null) return `${key}: ${JSON.stringify(value)}`;
      return `${key}: ${String(value)}`;
    })
    .join(", ");
}

export class Logger {
  private entries: LogEntry[] = [];
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();

  constructor(private level: LogLevel = "info", private shouldLog: boolean = true) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Drop the given keys, leaving the rest of the context in place
   */
  popContext(keys: (keyof LogContext)[]): void {
    const next: LogContext = { ...this.context };
    for (const key of keys) {
      delete next[key];
    }
    this.context = next;
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * Log `message` with the elapsed milliseconds and return them
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`);
      return 0;
    }
    this.timers.delete(name);
    const duration = Date.now() - start;
    this.log(level, message, { duration });
    return duration;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (RANK[level] < RANK[this.level]) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (Object.keys(this.context).length > 0) entry.context = { ...this.context };
    if (data && Object.keys(data).length > 0) entry.data = data;
    this.entries.push(entry);

    if (this.shouldLog) {
      const details = entry.data ? renderData(entry.data) : "";
      CONSOLE[level](renderPrefix(entry.context) + message + (details ? `\n  ${details}` : ""));
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Entries at or above `level`. */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => RANK[entry.level] >= RANK[level]);
  }

  clear(): void {
    this.entries = [];
  }

  getSummary(): LogSummary {
    const count = (level: LogLevel): number => this.entries.filter((entry) => entry.level === level).length;
    return {
      totalEntries: this.entries.length,
      debugCount: count("debug"),
      infoCount: count("info"),
      warnCount: count("warn"),
      errorCount: count("error"),
    };
  }
}

export const globalLogger = new Logger("info", true);
