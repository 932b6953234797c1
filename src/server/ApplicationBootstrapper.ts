// ApplicationBootstrapper.ts

import path from 'path';
import { ExpressApp } from './ExpressApp';
import { ShutdownCoordinator } from './ShutdownCoordinator';
import { RecipientStore } from './services/RecipientStore';
import { AlertDispatcher } from './services/AlertDispatcher';
import { DashboardRouteHandlers } from './controllers/DashboardRouteHandlers';
import { ErrorMiddleware } from './middleware/ErrorMiddleware';
import { FlashMessages } from './middleware/FlashMessages';
import { ScopedLogger } from './utils/ScopedLogger';
import { loadConfig } from './config';

export class ApplicationBootstrapper {
  /**
   * Builds the configuration once and wires every service by reference.
   * Throws ConfigurationError when required sender settings are missing.
   */
  public static bootstrapApplication(env: NodeJS.ProcessEnv = process.env): void {
    const logger = new ScopedLogger('[ALERTS]', env.LOG_SILENT !== '1');

    // 1. Load config/env
    const config = loadConfig(env, logger.child('[CONFIG]'));

    // 2. Instantiate services
    const recipientStore = new RecipientStore({
      filePath: path.resolve(config.recipientFile),
      logger: logger.child('[RECIPIENTS]'),
    });
    const alertDispatcher = new AlertDispatcher({
      sender: config.sender,
      recipientStore,
      logger: logger.child('[SMTP]'),
    });

    const flash = new FlashMessages();
    const errorMiddleware = new ErrorMiddleware(flash, logger.child('[HTTP]'));

    const dashboardRouteHandlers = new DashboardRouteHandlers({
      recipientStore,
      alertDispatcher,
      flash,
      senderAddress: config.sender.address,
    });

    // 3. ExpressApp instantiation
    const expressApp = new ExpressApp({
      dashboardRouteHandlers,
      errorMiddleware,
      logger: logger.child('[HTTP]'),
      production: config.production,
      logRequests: config.development,
      sessionOptions: {
        secret: config.sessionSecret,
        resave: false,
        saveUninitialized: false,
        cookie: {
          httpOnly: true,
          secure: config.production,
          sameSite: 'lax',
        },
      },
    });

    const server = expressApp.app.listen(config.port, config.host, () => {
      logger.info(`Alert dashboard listening on http://${config.host}:${config.port}`);
      logger.info(`Sender: ${config.sender.address}; recipient file: ${path.resolve(config.recipientFile)}`);
    });

    new ShutdownCoordinator(server, logger);
  }
}
