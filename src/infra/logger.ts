/**
 * Logger: leveled, scoped lines on stderr.
 *
 * stdout belongs to the MCP JSON-RPC stream, so nothing here writes to it.
 */

import { describeError } from "../domain/errors.ts";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(
  scope: string,
  options: { level?: LogLevel; sink?: LogSink; clock?: () => Date } = {},
): Logger {
  const { level = "info", sink = (line) => console.error(line), clock = () => new Date() } = options;

  const write = (at: LogLevel, message: string, context?: LogContext): void => {
    if (RANK[at] < RANK[level]) return;
    const fields = context ? formatContext(context) : "";
    sink(`${clock().toISOString()} ${at.toUpperCase()} [${scope}] ${message}${fields}`);
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (sub) => createLogger(`${scope}.${sub}`, { level, sink, clock }),
  };
}

function formatContext(context: LogContext): string {
  const parts = Object.entries(context).map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(describeError(value));
  if (typeof value === "string") return /\s|"/.test(value) ? JSON.stringify(value) : value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value) ?? String(value);
}
