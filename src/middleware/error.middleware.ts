import { Request, Response, NextFunction, RequestHandler } from "express";
import { config } from "../config/config";
import logger from "../utils/logger";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

interface ErrorResponseBody {
  error: string;
  path: string;
  requestId?: string;
  stack?: string;
}

const requestIdOf = (res: Response): string | undefined =>
  typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;

/**
 * Client errors (a rejected run, an unknown sync set) are logged as
 * warnings; anything else is a server error.
 */
export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const statusCode = err instanceof AppError ? err.statusCode : 500;
  const message = err.message || "Internal Server Error";
  const requestId = requestIdOf(res);
  const meta = {
    requestId,
    method: req.method,
    path: req.originalUrl,
    statusCode,
  };

  if (statusCode < 500) {
    logger.warn(`Request rejected: ${message}`, meta);
  } else {
    logger.error(`Request failed: ${message}`, { ...meta, stack: err.stack });
  }

  const response: ErrorResponseBody = {
    error: message,
    path: req.originalUrl,
    requestId,
  };

  if (config.NODE_ENV === "development") {
    response.stack = err.stack;
  }

  res.status(statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response) => {
  const response: ErrorResponseBody = {
    error: "Route not found",
    path: req.originalUrl,
    requestId: requestIdOf(res),
  };
  res.status(404).json(response);
};

// Async error wrapper
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
