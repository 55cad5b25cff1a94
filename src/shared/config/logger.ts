import type { Request, Response } from "express";
import pino, { type Logger, type LoggerOptions } from "pino";
import { config } from "./environment";

const loggerConfig: LoggerOptions = {
  level: config.logging.level,
  ...(config.logging.format === "pretty" && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
      },
    },
  }),
  ...(config.app.isProduction && {
    formatters: {
      level: (label: string) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }),
};

export const logger: Logger = pino(loggerConfig);

// Helper functions for consistent logging
export const createModuleLogger = (module: string): Logger => {
  return logger.child({ module });
};

export const logRequest = (req: Request, res: Response): void => {
  const start = Date.now();

  res.on("finish", () => {
    const duration = Date.now() - start;
    const logData = {
      method: req.method,
      url: req.originalUrl || req.url,
      status: res.statusCode,
      duration: `${duration}ms`,
      userAgent: req.get("User-Agent"),
      ip: req.ip,
      correlationId: req.correlationId,
      doctorId: req.doctor?.id,
    };

    if (res.statusCode >= 500) {
      logger.error(logData, "HTTP Request Failed");
    } else if (res.statusCode >= 400) {
      logger.warn(logData, "HTTP Request Error");
    } else {
      logger.info(logData, "HTTP Request");
    }
  });
};

// Parameter values are never logged, only their count.
export const logDatabaseQuery = (query: string, paramCount: number, duration?: number): void => {
  logger.debug(
    {
      query: query.replace(/\s+/g, " ").trim(),
      paramCount,
      duration: duration !== undefined ? `${duration}ms` : undefined,
    },
    "Database Query"
  );
};
