import type { Request, Response, NextFunction } from 'express';
import { Errors } from './error.js';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

function hasBody(req: Request): boolean {
  if (req.headers['transfer-encoding'] !== undefined) {
    return true;
  }
  const length = req.headers['content-length'];
  return length !== undefined && length !== '0';
}

/**
 * Reject write requests whose body is not JSON. Requests without a body
 * pass through and are validated as an empty object.
 */
export function requireJsonBody(req: Request, _res: Response, next: NextFunction): void {
  if (BODY_METHODS.has(req.method) && hasBody(req) && !req.is('application/json')) {
    next(Errors.unsupportedMediaType(req.headers['content-type']));
    return;
  }
  next();
}
