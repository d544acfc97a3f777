import winston from 'winston';
import { Response, Request, NextFunction } from 'express';

// Define a type-safe API error interface
export interface APIError extends Error {
  status?: number;
  code?: string;
  details?: unknown[];
}

// Base class for domain errors that know their HTTP mapping
export class HttpError extends Error implements APIError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
    public readonly details?: unknown[],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPolygonError extends HttpError {
  constructor(reason: string) {
    super('Invalid polygon', 400, 'INVALID_POLYGON', [reason]);
  }
}

export class StoreUnavailableError extends HttpError {
  constructor(store: string) {
    super(`${store} store is not configured`, 503, 'STORE_UNAVAILABLE');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Centralized error response and error handler for the API
export function errorResponse(
  res: Response,
  {
    error,
    details = [],
    code = undefined,
    status = 400,
  }: { error: string; details?: unknown[]; code?: string; status?: number },
) {
  // Always include details, default to empty array
  const body: { error: string; details: unknown[]; code?: string } = {
    error,
    details: details || [],
  };
  if (code) body.code = code;
  return res.status(status).json(body);
}

export function errorHandler(logger: winston.Logger) {
  return (err: Error | APIError, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) return next(err);
    const apiErr: APIError = err;
    const status = typeof apiErr.status === 'number' ? apiErr.status : 500;
    const message = apiErr.message || 'Internal server error';
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
    if (status >= 500) {
      logger.error('UNHANDLED ERROR', {
        message: apiErr.message,
        stack: apiErr.stack,
        route: req.originalUrl,
        method: req.method,
        requestId,
      });
    } else {
      logger.warn('Request rejected', { message, code: apiErr.code, route: req.originalUrl });
    }
    const body: { error: string; requestId?: string; code?: string; details?: unknown[] } = {
      error: message,
    };
    if (requestId) body.requestId = requestId;
    if (apiErr.code) body.code = apiErr.code;
    if (apiErr.details) body.details = apiErr.details;
    res.status(status).json(body);
  };
}
