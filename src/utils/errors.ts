/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * Referenced local input file is missing (404).
 */
export class InputNotFoundError extends NotFoundError {
  constructor(public inputPath: string) {
    super("Input file", inputPath);
  }
}

/**
 * External tool exited non-zero (500).
 * `output` holds the trailing part of the combined stdout/stderr.
 */
export class ExternalToolError extends AppError {
  constructor(
    public tool: string,
    public exitCode: number,
    public output: string
  ) {
    super(`${tool} exited with code ${exitCode}`, 500);
  }
}

/**
 * Session workspace could not be created (500).
 */
export class WorkspaceCreationError extends AppError {
  constructor(workspaceDir: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to create workspace ${workspaceDir}${reason}`, 500);
  }
}
