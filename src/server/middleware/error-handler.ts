/**
 * Express error middleware for the scheduling API.
 *
 * Returns a JSON error response instead of the default HTML page.
 */

import type { Request, Response, NextFunction } from 'express';
import { isInputError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (isInputError(err)) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }

  // body-parser attaches a status (400 for malformed JSON, 413 for oversized bodies)
  const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
  if (status >= 500) {
    log.error(err.message);
  }
  res.status(status).json({ error: err.message });
}
