import csurf from 'csurf';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import type { RequestHandler, Request, Response } from 'express';

export class CSRFandSecurityMiddleware {
  /**
   * Returns the csurf middleware for CSRF protection (session-backed secret).
   * Every POST form on the dashboard carries the `_csrf` hidden field.
   */
  static csrfProtection(): RequestHandler {
    return csurf();
  }

  /**
   * Returns the helmet middleware for CSP/security headers.
   * The dashboard serves no inline scripts or styles, so everything is 'self'.
   */
  static helmetCSP(production: boolean): RequestHandler {
    return helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          'default-src': ["'self'"],
          'style-src': ["'self'"],
          'script-src': ["'self'"],
          'form-action': ["'self'"],
          // plain-http LAN deployments would otherwise have their form posts upgraded
          'upgrade-insecure-requests': production ? [] : null,
        },
      },
    });
  }

  /**
   * Limits how often alerts can be broadcast from one client.
   * `onLimit` decides how the rejection is reported (the dashboard flashes and redirects).
   */
  static alertRateLimiter(
    onLimit: (req: Request, res: Response) => void,
    options?: { windowMs?: number; limit?: number }
  ): RequestHandler {
    return rateLimit({
      windowMs: options?.windowMs ?? 60 * 1000,
      limit: options?.limit ?? 5,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => onLimit(req, res),
    });
  }
}
