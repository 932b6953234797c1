import type { Server } from 'http';
import type { ILogger } from './utils/ScopedLogger';

export class ShutdownCoordinator {
  private server: Server;
  private logger: ILogger;
  private shuttingDown = false;

  constructor(server: Server, logger: ILogger) {
    this.server = server;
    this.logger = logger;
    this.registerHandlers();
  }

  private registerHandlers(): void {
    process.on('SIGTERM', () => this.gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => this.gracefulShutdown('SIGINT'));
  }

  public gracefulShutdown(signal: string): void {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.logger.info(`${signal} received, closing HTTP server`);
    this.server.close((err) => {
      if (err) {
        this.logger.error(`Error while closing HTTP server: ${err.message}`);
        process.exit(1);
      }
      process.exit(0);
    });
    setTimeout(() => {
      process.exit(1);
    }, 8000).unref();
  }
}
