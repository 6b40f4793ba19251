export interface LogContext {
  request_id?: string;
  tenant_id?: string;
  agent_id?: string;
  task_id?: string;
}

export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

const SERVICE_NAME = "taskgate-backend";

export function buildLogEntry(input: {
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level: input.level,
    message: input.message,
    service: SERVICE_NAME,
    ...(input.context ? { context: input.context } : {}),
    ...(input.data ? { data: input.data } : {})
  };
}

const LEVEL_RANK: Record<LogLevel | "silent", number> = { info: 0, warn: 1, error: 2, silent: 3 };

type LogOptions = { context?: LogContext; data?: Record<string, unknown> };

/** `LOG_LEVEL` is the lowest level written; `silent` turns logging off. Unknown values mean info. */
export function isLevelEnabled(level: LogLevel, threshold = process.env.LOG_LEVEL): boolean {
  const floor = threshold === "warn" || threshold === "error" || threshold === "silent" ? threshold : "info";
  return LEVEL_RANK[level] >= LEVEL_RANK[floor];
}

function write(level: LogLevel, message: string, options?: LogOptions): void {
  if (!isLevelEnabled(level)) return;
  const stream = level === "error" ? process.stderr : process.stdout;
  stream.write(`${JSON.stringify(buildLogEntry({ level, message, ...options }))}\n`);
}

export function logInfo(message: string, options?: LogOptions): void {
  write("info", message, options);
}

export function logWarn(message: string, options?: LogOptions): void {
  write("warn", message, options);
}

export function logError(message: string, options?: LogOptions): void {
  write("error", message, options);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
