/**
 * Engine logger (winston).
 *
 * Lines read `<time> <level> [module] <message> {meta}`. Entries about one
 * trade carry its id inside the tag (`[ledger POS-000003]`), so a position can
 * be followed from entry to exit with a single grep.
 */

import winston from "winston";

const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogLine {
  level: string;
  message: unknown;
  timestamp?: unknown;
  module?: unknown;
  positionId?: unknown;
  [key: string]: unknown;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

export function formatLine({ level, message, timestamp, module, positionId, ...meta }: LogLine): string {
  const source = typeof module === "string" ? module : "engine";
  const tag = typeof positionId === "string" ? `[${source} ${positionId}]` : `[${source}]`;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} ${level} ${tag} ${String(message)}${extra}`;
}

export const logger = winston.createLogger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" })
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ level: true }),
        winston.format.printf((info) => formatLine(info))
      ),
    }),
  ],
});

export function moduleLogger(module: string) {
  return logger.child({ module });
}

/** Child logger for messages about a single position */
export function positionLogger(module: string, positionId: string) {
  return logger.child({ module, positionId });
}
