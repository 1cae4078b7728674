import winston from "winston";
import { ConfigManager } from "../config";
import type { LogLevel } from "../types";

export type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;

function createLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${timestamp}] [MerkleFunnel] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        if (stack) {
          return `${prefix} ${message}${extra}\n${stack}`;
        }
        return `${prefix} ${message}${extra}`;
      })
    ),
    transports: [new winston.transports.Console()],
  });
}

/** Follows the configured level, so a later initMerkleFunnel() takes effect */
export function getLogger(): winston.Logger {
  const level = ConfigManager.cfg.logLevel;
  if (!logger) {
    logger = createLogger(level);
  } else if (logger.level !== level) {
    logger.level = level;
  }
  return logger;
}

export const log = {
  error: (message: string, meta?: LogMeta) => getLogger().error(message, meta),
  warn: (message: string, meta?: LogMeta) => getLogger().warn(message, meta),
  info: (message: string, meta?: LogMeta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: LogMeta) =>
    getLogger().verbose(message, meta),
  debug: (message: string, meta?: LogMeta) => getLogger().debug(message, meta),
  silly: (message: string, meta?: LogMeta) => getLogger().silly(message, meta),
};
