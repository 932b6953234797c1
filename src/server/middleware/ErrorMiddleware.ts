/**
 * /src/server/middleware/ErrorMiddleware.ts
 *
 * Terminal handlers for the Express chain. Unknown routes go back to the dashboard;
 * unhandled errors are logged and reported to the operator as a flash message.
 * Never exposes stack traces to the client.
 */

import type { Request, Response, NextFunction } from 'express';
import type { IErrorMiddleware, IFlashMessages } from '../../shared/contracts/interfaces';
import { errorCode, errorMessage } from '../utils/errorDetails';
import type { ILogger } from '../utils/ScopedLogger';

export const INTERNAL_ERROR_MESSAGE = 'An internal error occurred. Please try again.';
export const CSRF_ERROR_MESSAGE =
  'Your session has expired or the form is invalid. Please refresh the page and try again.';

export class ErrorMiddleware implements IErrorMiddleware {
  private flash: IFlashMessages;
  private logger: ILogger;

  constructor(flash: IFlashMessages, logger: ILogger) {
    this.flash = flash;
    this.logger = logger;
  }

  handleNotFound(req: Request, res: Response): void {
    res.redirect(302, '/');
  }

  handleError(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(err);
      return;
    }

    const csrfFailure = errorCode(err) === 'EBADCSRFTOKEN';
    if (!csrfFailure) {
      this.logger.error(`Unhandled error on ${req.method} ${req.originalUrl}: ${errorMessage(err)}`);
    }

    // The dashboard itself failed: redirecting there again would loop
    if (req.method === 'GET' && req.path === '/') {
      res.status(500).type('text/plain').send(INTERNAL_ERROR_MESSAGE);
      return;
    }

    if (req.session) {
      this.flash.push(req, 'error', csrfFailure ? CSRF_ERROR_MESSAGE : INTERNAL_ERROR_MESSAGE);
    }
    res.redirect(303, '/');
  }
}
