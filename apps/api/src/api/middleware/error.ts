import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { ErrorCodes, ErrorStatusCodes, isErrorCode, type ErrorCode } from '@server-registry/shared';
import logger from '../../lib/logger.js';

const apiLogger = logger.child({ component: 'api-error' });

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
  headers?: Record<string, string>;
  isOperational?: boolean; // Marks errors that are safe to expose to clients
}

/**
 * Error codes whose messages are safe to send to clients.
 */
const SAFE_ERROR_CODES = new Set<string>([
  ErrorCodes.VALIDATION_ERROR,
  ErrorCodes.INVALID_REQUEST,
  ErrorCodes.NOT_FOUND,
  ErrorCodes.SERVER_NOT_FOUND,
  ErrorCodes.METHOD_NOT_ALLOWED,
  ErrorCodes.UNSUPPORTED_MEDIA_TYPE,
  ErrorCodes.PAYLOAD_TOO_LARGE,
  ErrorCodes.RATE_LIMIT_EXCEEDED,
]);

/**
 * Generic error messages for error codes that should not expose details.
 */
const GENERIC_ERROR_MESSAGES: Partial<Record<ErrorCode, string>> = {
  [ErrorCodes.INTERNAL_ERROR]: 'An internal error occurred. Please try again later.',
  [ErrorCodes.DATABASE_ERROR]: 'A database error occurred. Please try again later.',
  [ErrorCodes.SERVICE_UNAVAILABLE]: 'Service is temporarily unavailable. Please try again later.',
};

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatZodIssues(err: ZodError): ValidationIssue[] {
  return err.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}

/**
 * Shape of the errors raised by express.json() (body-parser).
 */
interface BodyParserError extends Error {
  type: string;
  status?: number;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return err instanceof Error && 'type' in err && typeof err.type === 'string';
}

/**
 * Map anything thrown by a handler or middleware onto an ApiError.
 */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ZodError) {
    return createTypedError(ErrorCodes.VALIDATION_ERROR, 'Invalid request', formatZodIssues(err));
  }
  if (isBodyParserError(err)) {
    if (err.type === 'entity.parse.failed') {
      return createTypedError(ErrorCodes.INVALID_REQUEST, 'Malformed JSON body');
    }
    if (err.type === 'entity.too.large') {
      return createTypedError(ErrorCodes.PAYLOAD_TOO_LARGE, 'Request body is too large');
    }
    if (err.type === 'charset.unsupported' || err.type === 'encoding.unsupported') {
      return createTypedError(ErrorCodes.UNSUPPORTED_MEDIA_TYPE, err.message);
    }
  }
  if (err instanceof Error) {
    return err;
  }
  return new Error(String(err));
}

export function errorHandler(
  thrown: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const err = toApiError(thrown);
  const statusCode = err.statusCode || 500;
  const code = err.code || ErrorCodes.INTERNAL_ERROR;

  // Request ID for correlation
  const requestId = req.requestId || uuidv4();

  // Always log full error details server-side
  if (statusCode >= 500) {
    apiLogger.error({
      err,
      statusCode,
      code,
      requestId,
      method: req.method,
      path: req.path,
    }, 'API error');
  } else {
    apiLogger.warn({
      err,
      statusCode,
      code,
      requestId,
      method: req.method,
      path: req.path,
    }, 'API client error');
  }

  const isOperational = err.isOperational ?? SAFE_ERROR_CODES.has(code);
  let clientMessage: string;

  if (isOperational) {
    clientMessage = err.message || 'An error occurred';
  } else {
    clientMessage = (isErrorCode(code) && GENERIC_ERROR_MESSAGES[code])
      || 'An unexpected error occurred. Please try again later.';
  }

  const errorResponse: { code: string; message: string; requestId: string; details?: unknown } = {
    code,
    message: clientMessage,
    requestId,
  };

  // Only include details for operational errors (validation details, etc.)
  if (isOperational && err.details !== undefined) {
    errorResponse.details = err.details;
  }

  if (err.headers) {
    res.set(err.headers);
  }

  res.status(statusCode).json({
    error: errorResponse,
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: ErrorCodes.NOT_FOUND,
      message: 'Resource not found',
      requestId: req.requestId,
    },
  });
}

/**
 * Answer 405 for a known path hit with a method it does not serve.
 */
export function methodNotAllowed(...allowed: string[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(Errors.methodNotAllowed(req.method, allowed));
  };
}

/**
 * Create an API error with the given message, status code, and optional code.
 */
export function createError(message: string, statusCode: number, code?: string, details?: unknown): ApiError {
  const error: ApiError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

/**
 * Create an API error using a predefined error code.
 * Status code is derived from the error code.
 */
export function createTypedError(code: ErrorCode, message: string, details?: unknown): ApiError {
  return createError(message, ErrorStatusCodes[code], code, details);
}

export const Errors = {
  serverNotFound(id: number | string): ApiError {
    return createTypedError(ErrorCodes.SERVER_NOT_FOUND, `Server '${id}' not found`);
  },

  validation(message: string, details?: unknown): ApiError {
    return createTypedError(ErrorCodes.VALIDATION_ERROR, message, details);
  },

  methodNotAllowed(method: string, allowed: string[]): ApiError {
    const error = createTypedError(ErrorCodes.METHOD_NOT_ALLOWED, `Method '${method}' not allowed`);
    error.headers = { Allow: allowed.join(', ') };
    return error;
  },

  unsupportedMediaType(contentType: string | undefined): ApiError {
    return createTypedError(
      ErrorCodes.UNSUPPORTED_MEDIA_TYPE,
      `Unsupported media type '${contentType ?? 'none'}', expected application/json`
    );
  },
};
