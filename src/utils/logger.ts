import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "warn" | "error" | "critical";

export type LogEntry = {
  message: string;
  [field: string]: unknown;
};

export type LogRecord = LogEntry & {
  timestamp: string;
  level: LogLevel;
};

export type Logger = {
  info(entry: LogEntry): void;
  warn(entry: LogEntry): void;
  error(entry: LogEntry): void;
  critical(entry: LogEntry): void;
};

type LogConsole = Pick<Console, "info" | "warn" | "error">;

export type LoggerOptions = {
  filePath?: string;
  console?: LogConsole;
  now?: () => Date;
};

/**
 * Writes every record to the console and, when a file path is given,
 * appends it as a JSON line to that file.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.console ?? console;
  const now = options.now ?? (() => new Date());
  const filePath = options.filePath?.trim();
  if (filePath) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  const write = (level: LogLevel, entry: LogEntry) => {
    const record: LogRecord = {
      timestamp: now().toISOString(),
      level,
      ...entry
    };
    if (level === "info") {
      out.info(record);
    } else if (level === "warn") {
      out.warn(record);
    } else {
      out.error(record);
    }
    if (filePath) {
      try {
        fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`, "utf-8");
      } catch (error) {
        out.error({
          timestamp: record.timestamp,
          level: "error",
          message: "logger.file_write_failed",
          file: filePath,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  };

  return {
    info: (entry) => write("info", entry),
    warn: (entry) => write("warn", entry),
    error: (entry) => write("error", entry),
    critical: (entry) => write("critical", entry)
  };
}
