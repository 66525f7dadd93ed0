type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  repo?: string;
  pr?: number;
  action?: string;
  provider?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function getMinLevel(): number {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

export function formatLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const entry = {
    ...context,
    timestamp: new Date().toISOString(),
    level,
    message,
  };
  return JSON.stringify(entry);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if (getMinLevel() <= LOG_LEVELS.debug) {
      console.debug(formatLog("debug", message, context));
    }
  },

  info(message: string, context?: LogContext): void {
    if (getMinLevel() <= LOG_LEVELS.info) {
      console.log(formatLog("info", message, context));
    }
  },

  warn(message: string, context?: LogContext): void {
    if (getMinLevel() <= LOG_LEVELS.warn) {
      console.warn(formatLog("warn", message, context));
    }
  },

  error(message: string, context?: LogContext): void {
    if (getMinLevel() <= LOG_LEVELS.error) {
      console.error(formatLog("error", message, context));
    }
  },

  withContext(defaultContext: LogContext): Logger {
    return {
      debug: (message: string, context?: LogContext) =>
        logger.debug(message, { ...defaultContext, ...context }),
      info: (message: string, context?: LogContext) =>
        logger.info(message, { ...defaultContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        logger.warn(message, { ...defaultContext, ...context }),
      error: (message: string, context?: LogContext) =>
        logger.error(message, { ...defaultContext, ...context }),
    };
  },
};
