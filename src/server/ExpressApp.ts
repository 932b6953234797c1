//ExpressApp.ts

import express from 'express';
import session from 'express-session';
import ejsMate from 'ejs-mate';
import type {
  IDashboardRouteHandlers,
  IErrorMiddleware,
} from '../shared/contracts/interfaces';
import { CSRFandSecurityMiddleware } from './middleware/CSRFandSecurityMiddleware';
import { StaticAssetMiddleware } from './middleware/StaticAssetMiddleware';
import { repoPath } from './utils/repoPath';
import type { ILogger } from './utils/ScopedLogger';

export class ExpressApp {
  public app: express.Express;

  constructor(deps: {
    dashboardRouteHandlers: IDashboardRouteHandlers;
    errorMiddleware: IErrorMiddleware;
    logger: ILogger;
    sessionOptions: session.SessionOptions;
    production: boolean;
    logRequests: boolean;
  }) {
    this.app = express();

    if (deps.logRequests) {
      this.app.use((req, res, next) => {
        res.on('finish', () => deps.logger.info(`${req.method} ${req.originalUrl} → ${res.statusCode}`));
        next();
      });
    }

    // Forms are urlencoded; nothing posts JSON
    this.app.use(express.urlencoded({ extended: false }));

    // Session middleware (must precede CSRF and flash messages)
    this.app.use(session(deps.sessionOptions));

    // Security headers — run BEFORE static + routes
    this.app.use(CSRFandSecurityMiddleware.helmetCSP(deps.production));

    // Static assets under /static/*
    this.app.use('/static', StaticAssetMiddleware);

    this.app.use(CSRFandSecurityMiddleware.csrfProtection());

    this.app.set('views', repoPath('src', 'server', 'views'));
    this.app.engine('ejs', ejsMate);
    this.app.set('view engine', 'ejs');

    const alertLimiter = CSRFandSecurityMiddleware.alertRateLimiter((req, res) =>
      deps.dashboardRouteHandlers.handleAlertRateLimited(req, res)
    );

    // --- Dashboard routes ---
    const dashboardRouter = express.Router();
    dashboardRouter.get('/', (req, res, next) =>
      deps.dashboardRouteHandlers.handleIndexGet(req, res, next)
    );
    dashboardRouter.post('/send-alert', alertLimiter, (req, res, next) =>
      deps.dashboardRouteHandlers.handleSendAlertPost(req, res, next)
    );
    dashboardRouter.post('/update-clients', (req, res, next) =>
      deps.dashboardRouteHandlers.handleUpdateClientsPost(req, res, next)
    );
    dashboardRouter.post('/delete-clients', (req, res, next) =>
      deps.dashboardRouteHandlers.handleDeleteClientsPost(req, res, next)
    );
    this.app.use(dashboardRouter);

    // --- Unknown routes back to the dashboard ---
    this.app.use((req, res) => deps.errorMiddleware.handleNotFound(req, res));

    // --- Global error middleware (must be last) ---
    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      deps.errorMiddleware.handleError(err, req, res, next);
    });
  }
}
