import rateLimit from "express-rate-limit";
import { config } from "@/shared/config/environment";
import type { ApiResponse } from "@/shared/types/common.types";

// In-memory stores: limits are per process

// General rate limiting
export const generalRateLimit = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: {
    success: false,
    message: "Too many requests, please try again later",
    code: "RATE_LIMIT_EXCEEDED",
  } satisfies ApiResponse,
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => req.path.startsWith("/health"),
});

// Strict rate limiting for authentication endpoints
export const authRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: config.app.isTest ? config.rateLimit.maxRequests : 10,
  message: {
    success: false,
    message: "Too many authentication attempts, please try again later",
    code: "RATE_LIMIT_EXCEEDED",
  } satisfies ApiResponse,
  standardHeaders: true,
  legacyHeaders: false,
  skipSuccessfulRequests: true,
});
