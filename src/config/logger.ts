import { chmodSync, closeSync, openSync } from "node:fs";
import winston from "winston";
import { config } from "./index.js";

const LOG_FILE_MODE = 0o640;

/** One line per event: `2026-10-19T03:00:00: message {"meta":"..."}`. */
export function formatLine(info: { [key: string]: unknown }): string {
  const { level: _level, message, timestamp, ...meta } = info;
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)}: ${String(message)}${rest}`;
}

/** Create the log file if needed and restrict it to 0640, whatever mode it had before. */
export function prepareLogFile(path: string): void {
  closeSync(openSync(path, "a", LOG_FILE_MODE));
  chmodSync(path, LOG_FILE_MODE);
}

let logFileError: string | null = null;

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (!config.logFile) return transports;

  try {
    prepareLogFile(config.logFile);
    transports.push(new winston.transports.File({ filename: config.logFile, options: { flags: "a" } }));
  } catch (err) {
    logFileError = err instanceof Error ? err.message : String(err);
  }
  return transports;
}

export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss" }),
    winston.format.printf(formatLine),
  ),
  transports: buildTransports(),
});

if (logFileError) {
  logger.warn(`Cannot open log file ${config.logFile}, logging to console only`, { err: logFileError });
}
