import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { config } from "@/shared/config/environment";
import { logger } from "@/shared/config/logger";
import { AppError, ValidationError, type IValidationError } from "@/shared/types/common.types";
import { sendError } from "@/shared/utils/response";
import { formatZodErrors } from "./validation.middleware";

// body-parser rejects client input with a 4xx `status` and a `type` tag
interface BodyParserError extends Error {
  status: number;
  type: string;
}

const BODY_PARSER_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Malformed JSON body",
  "entity.too.large": "Request body too large",
  "charset.unsupported": "Unsupported request charset",
  "encoding.unsupported": "Unsupported request encoding",
};

const isBodyParserError = (error: Error): error is BodyParserError => {
  return (
    "type" in error &&
    typeof error.type === "string" &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  );
};

export const errorHandler = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  // If response was already sent, delegate to default Express error handler
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof ZodError) {
    sendError(res, "Request validation failed", 400, "VALIDATION_ERROR", formatZodErrors(error));
    return;
  }

  if (isBodyParserError(error)) {
    sendError(res, BODY_PARSER_MESSAGES[error.type] ?? error.message, error.status, "VALIDATION_ERROR");
    return;
  }

  if (error instanceof AppError) {
    let errors: IValidationError[] | undefined;

    if (error instanceof ValidationError) {
      errors = [
        {
          field: error.field ?? "validation",
          message: error.message,
          code: error.code,
        },
      ];
    }

    sendError(res, error.message, error.statusCode, error.code, errors);
    return;
  }

  // Log unexpected errors
  logger.error(
    {
      err: error,
      request: {
        method: req.method,
        url: req.originalUrl,
        body: config.app.isDevelopment ? req.body : "[REDACTED]",
        ip: req.ip,
        userAgent: req.get("User-Agent"),
        correlationId: req.correlationId,
        doctorId: req.doctor?.id,
      },
    },
    "Unexpected error"
  );

  // Don't expose internal error details in production
  const message = config.app.isDevelopment ? error.message || "Internal server error" : "Internal server error";

  sendError(
    res,
    message,
    500,
    "INTERNAL_ERROR",
    undefined,
    config.app.isDevelopment ? { stack: error.stack, correlationId: req.correlationId } : undefined
  );
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new AppError(`Route ${req.method} ${req.originalUrl} not found`, 404, "ROUTE_NOT_FOUND"));
};
