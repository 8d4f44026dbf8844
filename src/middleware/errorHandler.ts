/**
 * Centralized error handling middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';

// Base error classes
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public isOperational = true,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, 'VALIDATION_ERROR', true, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, `${resource} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, originalError?: unknown) {
    super(500, message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
    if (originalError instanceof Error) {
      this.stack = originalError.stack;
    }
  }
}

interface ErrorBody {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string;
  };
}

// Request logging middleware
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const start = Date.now();

  logger.info('Incoming request', {
    method: req.method,
    url: req.url,
    query: req.query,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    logger.info('Response sent', {
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${Date.now() - start}ms`,
      responseSize: res.get('Content-Length'),
    });
  });

  next();
};

const handleValidationError = (error: ZodError): AppError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    error.errors,
  );
};

// pg and socket errors carry a string `code` (SQLSTATE or ECONNREFUSED etc.)
const hasErrorCode = (error: Error): error is Error & { code: string } =>
  'code' in error && typeof error.code === 'string';

// body-parser, express and other http-errors style failures carry a `status`
const hasClientStatus = (error: Error): error is Error & { status: number } =>
  'status' in error &&
  typeof error.status === 'number' &&
  error.status >= 400 &&
  error.status < 500;

const handleDatabaseError = (error: Error & { code: string }): AppError => {
  logger.error('Database error details', {
    name: error.name,
    code: error.code,
    message: error.message,
    stack: error.stack,
  });

  return new DatabaseError('Database operation failed', error);
};

// Main error handling middleware
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // express recognizes error middleware by arity
  next: NextFunction,
) => {
  let appError: AppError;

  if (error instanceof AppError) {
    appError = error;
  } else if (error instanceof ZodError) {
    appError = handleValidationError(error);
  } else if (hasClientStatus(error)) {
    appError = new AppError(error.status, error.message, 'BAD_REQUEST');
  } else if (hasErrorCode(error)) {
    appError = handleDatabaseError(error);
  } else {
    // Unknown error - don't leak details in production
    appError = new AppError(
      500,
      process.env.NODE_ENV === 'production'
        ? 'Something went wrong'
        : error.message,
      'INTERNAL_ERROR',
      false,
    );
  }

  const logData = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      stack: appError.stack,
    },
    request: {
      method: req.method,
      url: req.url,
      query: req.query,
      ip: req.ip,
      userAgent: req.get('User-Agent'),
    },
  };

  if (appError.statusCode >= 500) {
    logger.error('Server error', logData);
  } else if (appError.statusCode >= 400) {
    logger.warn('Client error', logData);
  } else {
    logger.info('Request error', logData);
  }

  const response: ErrorBody = {
    error: {
      message: appError.message,
      code: appError.code || 'UNKNOWN_ERROR',
    },
  };

  // Include additional details in development
  if (process.env.NODE_ENV === 'development') {
    response.error.details = appError.details;
    if (!appError.isOperational) {
      response.error.stack = appError.stack;
    }
  }

  res.status(appError.statusCode).json(response);
};

// Async error wrapper for route handlers
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

// 404 handler for unmatched routes
export const notFoundHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  next(new NotFoundError(`Route ${req.method} ${req.path}`));
};
