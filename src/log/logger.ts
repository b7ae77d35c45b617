export type LogLevel = "error" | "warn" | "info" | "debug";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: LogLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type LogSink = { write(chunk: string): unknown };

export type Logger = {
  error(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
  info(code: string, message: string, details?: Record<string, unknown>): void;
  debug(code: string, message: string, details?: Record<string, unknown>): void;
};

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type LoggerOptions = {
  format: OutputFormat;
  level: LogLevel;
  stdout?: LogSink;
  stderr?: LogSink;
};

/** Format a diagnostic for a terminal. Debug and warn lines carry a prefix. */
export function formatHuman(d: Diagnostic): string {
  switch (d.level) {
    case "error":
      return `error: ${d.message}`;
    case "warn":
      return `warning: ${d.message}`;
    case "debug":
      return `debug: ${d.message}`;
    default:
      return d.message;
  }
}

/**
 * Logger writing diagnostics either as JSON lines on stdout or as plain text
 * (info/debug on stdout, warn/error on stderr).
 */
export function createLogger(opts: LoggerOptions): Logger {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  const threshold = LEVEL_RANK[opts.level];

  const emit = (level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] > threshold) return;
    const diagnostic: Diagnostic = details ? { level, code, message, details } : { level, code, message };
    if (opts.format === "jsonl") {
      stdout.write(JSON.stringify(diagnostic) + "\n");
      return;
    }
    const sink = level === "error" || level === "warn" ? stderr : stdout;
    sink.write(formatHuman(diagnostic) + "\n");
  };

  return {
    error: (code, message, details) => emit("error", code, message, details),
    warn: (code, message, details) => emit("warn", code, message, details),
    info: (code, message, details) => emit("info", code, message, details),
    debug: (code, message, details) => emit("debug", code, message, details),
  };
}
