import type { Response } from "express";
import type { ApiResponse, ErrorCode, IValidationError } from "@/shared/types/common.types";

// Success response utilities
export const sendSuccess = <T>(res: Response, data?: T, message: string = "Success", statusCode: number = 200): void => {
  const response: ApiResponse<T> = {
    success: true,
    ...(data !== undefined && { data }),
    message,
  };

  res.status(statusCode).json(response);
};

export const sendCreated = <T>(res: Response, data: T, message: string = "Resource created successfully"): void => {
  sendSuccess(res, data, message, 201);
};

export const sendDeleted = (res: Response, message: string = "Resource deleted successfully"): void => {
  sendSuccess(res, undefined, message, 200);
};

// Error response utilities
export const sendError = (
  res: Response,
  message: string,
  statusCode: number,
  code: ErrorCode,
  errors?: IValidationError[],
  debug?: Record<string, unknown>
): void => {
  const response: ApiResponse = {
    success: false,
    message,
    code,
    ...(errors && errors.length > 0 && { errors }),
    ...(debug && { debug }),
  };

  res.status(statusCode).json(response);
};

export const sendValidationError = (
  res: Response,
  errors: IValidationError[],
  message: string = "Validation failed"
): void => {
  sendError(res, message, 400, "VALIDATION_ERROR", errors);
};
