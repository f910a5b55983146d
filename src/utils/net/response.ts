import type { Response } from 'express';
import { err, warn } from '../logger';
import { isValidationError } from '../validate/errors';

/**
 * Sends a handler's failure to the client. Validation errors are the user's to fix (400);
 * anything else is logged and reported without detail (500).
 */
export function sendError(res: Response, error: unknown) {
  if (isValidationError(error)) {
    warn('Rejected request', { field: error.field, message: error.message });
    res.status(400).json({ error: error.message, field: error.field });
    return;
  }
  err('Request failed:', error instanceof Error ? error : String(error));
  res.status(500).json({ error: 'Internal server error' });
}

/**
 * Runs a handler and sends its result as JSON, or the error it raised
 */
export function respond(res: Response, handler: () => unknown) {
  try {
    res.json(handler());
  } catch (error) {
    sendError(res, error);
  }
}
