/**
 * Agrarian BNPL - Error Handling Middleware
 * FAIL LOUDLY: every error reaches the client as JSON with a timestamp.
 */

import { NextFunction, Request, Response } from 'express';
import { NotFoundError, ValidationError } from '../../shared/errors';

// Rejections raised by express.json() before a route runs
const BODY_ERROR_CODES = new Map<string, string>([
  ['entity.too.large', 'PAYLOAD_TOO_LARGE'],
  ['encoding.unsupported', 'UNSUPPORTED_ENCODING'],
  ['charset.unsupported', 'UNSUPPORTED_CHARSET'],
  ['request.aborted', 'REQUEST_ABORTED'],
]);

function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

function bodyErrorCode(err: Error): string {
  const type = 'type' in err && typeof err.type === 'string' ? err.type : '';
  return BODY_ERROR_CODES.get(type) ?? 'BAD_REQUEST';
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not Found', path: req.path });
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  const timestamp = new Date().toISOString();

  if (err instanceof ValidationError) {
    console.warn(`[Validation] ${err.message}: ${err.issues.map(i => i.field).join(', ')}`);
    res.status(400).json({
      error: err.code,
      message: err.message,
      issues: err.issues,
      timestamp,
    });
    return;
  }

  if (err instanceof NotFoundError) {
    res.status(404).json({ error: 'Not Found', message: err.message, timestamp });
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'INVALID_JSON', message: err.message, timestamp });
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    console.warn(`[Request] Rejected with ${status}: ${err.message}`);
    res.status(status).json({ error: bodyErrorCode(err), message: err.message, timestamp });
    return;
  }

  console.error('[Error]', err.message);
  console.error(err.stack);
  res.status(500).json({
    error: 'Internal server error',
    message: err.message,
    timestamp,
  });
}
