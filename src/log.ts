import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
  level: LogLevel;
  filePath?: string;
  fileLevel?: LogLevel;
  /** Interactive sessions keep stdout for the conversation. */
  console?: boolean;
}

export function createLogger(opts: LoggerOptions): Logger {
  const consoleEnabled = opts.console !== false;
  if (!opts.filePath) {
    return pino({ level: consoleEnabled ? opts.level : "silent" });
  }

  const dir = path.dirname(opts.filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }

  const streams: pino.StreamEntry[] = [];
  if (consoleEnabled && opts.level !== "silent") {
    streams.push({ level: opts.level, stream: process.stderr });
  }
  const fileLevel = opts.fileLevel ?? opts.level;
  if (fileLevel !== "silent") {
    streams.push({ level: fileLevel, stream: pino.destination({ dest: opts.filePath, sync: false }) });
  }
  if (streams.length === 0) return silentLogger();

  return pino({ level: "trace" }, pino.multistream(streams));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
