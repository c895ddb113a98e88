export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function parseLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? "info").toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

const minLevel = parseLevel(process.env.LOG_LEVEL);

const defaultHandler: LogHandler = (entry) => {
  if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(minLevel)) return;
  const prefix = `[${entry.level.toUpperCase()}] [${entry.module}]`;
  const msg = `${prefix} ${entry.message}`;
  // stdout is reserved for decoded events
  if (entry.data && Object.keys(entry.data).length > 0) {
    console.error(msg, JSON.stringify(entry.data));
  } else {
    console.error(msg);
  }
};

let handler: LogHandler = defaultHandler;

export function setLogHandler(h: LogHandler): void {
  handler = h;
}

export function resetLogHandler(): void {
  handler = defaultHandler;
}

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(module: string) {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    handler({ level, module, message, data, timestamp: Date.now() });
  };

  return {
    debug: (msg: string, data?: Record<string, unknown>) => log("debug", msg, data),
    info: (msg: string, data?: Record<string, unknown>) => log("info", msg, data),
    warn: (msg: string, data?: Record<string, unknown>) => log("warn", msg, data),
    error: (msg: string, data?: Record<string, unknown>) => log("error", msg, data),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
