import { join } from "node:path";

import pino, { type Logger, type LoggerOptions } from "pino";

import { getLogsDirectory } from "../environment/pathResolver.js";

export const LOG_ROOT = getLogsDirectory();

const LOG_FILE = "app.jsonl";

const destination = pino.destination({
  dest: join(LOG_ROOT, LOG_FILE),
  mkdir: true,
  sync: false
});

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime
};

const baseLogger = pino(baseOptions, destination);

export interface LoggerContext {
  runId?: string;
  position?: number;
  serviceType?: string;
  [key: string]: unknown;
}

export function createLogger(category: string, context: LoggerContext = {}): Logger {
  return baseLogger.child({ category, ...context });
}

export function getBaseLogger(): Logger {
  return baseLogger;
}

export interface LoggerFacade {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  /** 派生携带额外上下文（如 position / serviceType）的子 facade */
  child(context: LoggerContext): LoggerFacade;
}

export function createLoggerFacade(category: string, context: LoggerContext = {}): LoggerFacade {
  return wrapLogger(createLogger(category, context));
}

/**
 * 将任意 pino 实例包装为 facade；测试中可传入写入内存流的 logger。
 */
export function wrapLogger(logger: Logger): LoggerFacade {
  return {
    debug(message, extra = {}) {
      logger.debug(extra, message);
    },
    info(message, extra = {}) {
      logger.info(extra, message);
    },
    warn(message, extra = {}) {
      logger.warn(extra, message);
    },
    error(message, error, extra = {}) {
      if (error instanceof Error) {
        const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
        logger.error(
          { ...extra, error: { name: error.name, message: error.message, code, stack: error.stack } },
          message
        );
      } else if (error) {
        logger.error({ ...extra, error }, message);
      } else {
        logger.error(extra, message);
      }
    },
    child(childContext) {
      return wrapLogger(logger.child(childContext));
    }
  };
}
