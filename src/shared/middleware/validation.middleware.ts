import type { Request, Response, NextFunction } from "express";
import { z, ZodError } from "zod";
import type { IValidationError } from "@/shared/types/common.types";
import { sendValidationError } from "@/shared/utils/response";
import { createModuleLogger } from "@/shared/config/logger";

const moduleLogger = createModuleLogger("ValidationMiddleware");

// Common schemas
export const idParamSchema = z.object({
  id: z.coerce.number().int("Id must be an integer").positive("Id must be a positive integer"),
});

// Query strings carry booleans as text
export const booleanQuerySchema = z.enum(["true", "false"]).transform((value) => value === "true");

export const formatZodErrors = (error: ZodError): IValidationError[] => {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    message: issue.message,
    code: issue.code,
  }));
};

/**
 * Replaces `req.body` with the parsed value, so handlers read trimmed and
 * coerced input.
 */
export const validateBody = (schema: z.ZodTypeAny) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      req.body = await schema.parseAsync(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const validationErrors = formatZodErrors(error);

        moduleLogger.warn(
          {
            path: req.path,
            method: req.method,
            errors: validationErrors,
            correlationId: req.correlationId,
          },
          "Body validation failed"
        );

        sendValidationError(res, validationErrors, "Request validation failed");
        return;
      }
      next(error);
    }
  };
};
