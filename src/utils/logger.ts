import winston from "winston";
import { ConfigManager } from "../config";
import type { LogLevel } from "../types";

type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;
let levelOverride: LogLevel | undefined;

function resolveLevel(): string {
  if (levelOverride) return levelOverride;
  if (ConfigManager.loaded) return ConfigManager.cfg.logLevel;
  return process.env["PROMPT_LEDGER_LOG_LEVEL"] || "info";
}

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: resolveLevel(),
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${timestamp}] [PromptLedger] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        if (stack) {
          return `${prefix} ${message}${extra}\n${stack}`;
        }
        return `${prefix} ${message}${extra}`;
      })
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

export const log = {
  error: (message: string, meta?: LogMeta) => getLogger().error(message, meta),
  warn: (message: string, meta?: LogMeta) => getLogger().warn(message, meta),
  info: (message: string, meta?: LogMeta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: LogMeta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: LogMeta) => getLogger().debug(message, meta),
};

/** Pin the level, overriding configuration and environment. */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  if (logger) logger.level = level;
}

/** Drop the cached logger and any pinned level. */
export function resetLogger(): void {
  logger = null;
  levelOverride = undefined;
}
