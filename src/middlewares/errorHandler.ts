/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError, ExternalToolError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  details?: string;
  exitCode?: number;
  stack?: string;
}

/** body-parser and friends attach an HTTP status to their errors */
function httpStatusOf(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 600) {
    return error.status;
  }
  return undefined;
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode =
    error instanceof AppError ? error.statusCode : httpStatusOf(error) ?? 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    path: req.path,
    method: req.method,
  });

  const response: ErrorResponse = {
    error: message,
  };

  // Bounded tool output is the useful diagnostic for the caller
  if (error instanceof ExternalToolError) {
    response.details = error.output;
    response.exitCode = error.exitCode;
  }

  // Include stack trace in development for unexpected errors
  if (NODE_ENV === "development" && statusCode >= 500 && !(error instanceof AppError)) {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
