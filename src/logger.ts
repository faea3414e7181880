import { chalkStderr } from "chalk";
import { appendFileSync } from "fs";
import { dirname } from "path";
import type { Config } from "./types.js";
import { ensureDir } from "./utils/fs.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  name: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(line: string, entry: LogEntry): void;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sinks: LogSink[];
  now?: () => Date;
  onSinkError?: (error: unknown, sink: LogSink) => void;
}

export const LOGGER_NAME = "testnet-order";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function escapeLineBreaks(text: string): string {
  return text.replace(/\r/g, "\\r").replace(/\n/g, "\\n");
}

export function formatLogEntry(entry: LogEntry): string {
  const message = escapeLineBreaks(entry.message);
  const parts = [entry.timestamp, entry.level.toUpperCase(), entry.name, message];
  const line = parts.join(" - ");

  if (entry.data && Object.keys(entry.data).length > 0) {
    return `${line} ${JSON.stringify(entry.data)}`;
  }

  return line;
}

export class FileSink implements LogSink {
  constructor(private readonly path: string) {
    ensureDir(dirname(path));
  }

  write(line: string): void {
    appendFileSync(this.path, line + "\n", { encoding: "utf-8" });
  }
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalkStderr.dim(text),
  info: (text) => text,
  warn: (text) => chalkStderr.yellow(text),
  error: (text) => chalkStderr.red(text)
};

/** Writes to stderr so stdout carries nothing but the order response. */
export class ConsoleSink implements LogSink {
  write(line: string, entry: LogEntry): void {
    process.stderr.write(LEVEL_COLORS[entry.level](line) + "\n");
  }
}

export class MemorySink implements LogSink {
  readonly lines: string[] = [];
  readonly entries: LogEntry[] = [];

  write(line: string, entry: LogEntry): void {
    this.lines.push(line);
    this.entries.push(entry);
  }
}

function reportSinkError(error: unknown, sink: LogSink): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Log sink ${sink.constructor.name} failed: ${reason}\n`);
}

export function createLogger(options: LoggerOptions): Logger {
  const name = options.name ?? LOGGER_NAME;
  const threshold = LOG_LEVELS[options.level ?? "info"];
  const now = options.now ?? (() => new Date());
  const onSinkError = options.onSinkError ?? reportSinkError;

  const writeLog = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }

    const entry: LogEntry = {
      timestamp: now().toISOString(),
      level,
      name,
      message,
      data
    };
    const line = formatLogEntry(entry);

    // sink failures are reported, never thrown
    for (const sink of options.sinks) {
      try {
        sink.write(line, entry);
      } catch (error) {
        onSinkError(error, sink);
      }
    }
  };

  const bind = (context?: Record<string, unknown>): Logger => {
    const merge = (data?: Record<string, unknown>) =>
      context ? { ...context, ...data } : data;

    return {
      debug: (message, data) => writeLog("debug", message, merge(data)),
      info: (message, data) => writeLog("info", message, merge(data)),
      warn: (message, data) => writeLog("warn", message, merge(data)),
      error: (message, data) => writeLog("error", message, merge(data)),
      child: (extra) => bind({ ...context, ...extra })
    };
  };

  return bind();
}

let processLogger: Logger | null = null;

/**
 * Builds the process logger on first call: one file sink and one console sink.
 * Later calls return the same instance and ignore their arguments.
 */
export function initLogger(config: Pick<Config, "logFile" | "logLevel">, sinks?: LogSink[]): Logger {
  if (processLogger) {
    return processLogger;
  }

  processLogger = createLogger({
    level: config.logLevel,
    sinks: sinks ?? [new FileSink(config.logFile), new ConsoleSink()]
  });
  return processLogger;
}
