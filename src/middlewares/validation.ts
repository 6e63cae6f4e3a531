/**
 * Validation Middleware
 * Validates request bodies and query strings against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import { ZodSchema, ZodError } from "zod";

function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({
    error: "Validation failed",
    details: error.issues.map((e) => ({
      path: e.path.join("."),
      message: e.message,
    })),
  });
}

/**
 * Validates request body against a Zod schema.
 * Replaces req.body with the parsed value (defaults applied).
 */
export function validateBody(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        sendValidationError(res, error);
      } else {
        next(error);
      }
    }
  };
}

/**
 * Validates the query string against a Zod schema.
 * The parsed value is stored on res.locals.query.
 */
export function validateQuery(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    res.locals.query = result.data;
    next();
  };
}
