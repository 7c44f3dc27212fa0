// Structured logger shared by the policy core and the dispatcher

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  taskKind?: string;
  instanceId?: string;
  attempt?: number;
  metadata?: Record<string, unknown>;
}

// Receives every emitted entry as a JSON line, whatever the console format
export interface LogSink {
  writeLine(line: string): void;
}

export interface LoggerConfig {
  component: string;
  taskKind?: string;
  instanceId?: string;
  attempt?: number;
  minLevel?: LogLevel;
  jsonOutput?: boolean;
  sink?: LogSink;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = {
      minLevel: parseLogLevel(process.env.LOG_LEVEL),
      jsonOutput: process.env.LOG_FORMAT === "json",
      ...config,
    };
  }

  // Child logger carrying extra context (task kind, instance, attempt)
  child(context: Partial<LoggerConfig>): Logger {
    return new Logger({
      ...this.config,
      ...context,
    });
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel ?? "info"]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...(this.config.taskKind && { taskKind: this.config.taskKind }),
      ...(this.config.instanceId && { instanceId: this.config.instanceId }),
      ...(this.config.attempt !== undefined && { attempt: this.config.attempt }),
      ...(metadata && { metadata }),
    };

    const line = JSON.stringify(entry);
    this.config.sink?.writeLine(line);

    if (this.config.jsonOutput) {
      console.log(line);
      return;
    }

    const prefix = this.formatPrefix(entry);
    const metaStr = metadata ? ` ${JSON.stringify(metadata)}` : "";

    switch (level) {
      case "error":
        console.error(`${prefix} ${message}${metaStr}`);
        break;
      case "warn":
        console.warn(`${prefix} ${message}${metaStr}`);
        break;
      default:
        console.log(`${prefix} ${message}${metaStr}`);
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const time = entry.timestamp.split("T")[1]?.slice(0, 8) ?? "";
    const level = entry.level.toUpperCase().padEnd(5);
    const task = entry.taskKind ? `[${entry.taskKind}${entry.attempt !== undefined ? `#${entry.attempt}` : ""}]` : "";
    return `${time} ${level} [${entry.component}]${task}`;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log("error", message, metadata);
  }
}

export function createLogger(component: string, config: Omit<LoggerConfig, "component"> = {}): Logger {
  return new Logger({ component, ...config });
}
