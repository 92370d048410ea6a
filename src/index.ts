import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { initializeLogger, logger } from './middleware/logging.js';

const config = ConfigManager.getInstance().getConfig();
initializeLogger(config.logging);

const app = new App(config);

// Graceful shutdown handling
const shutdown = (signal: string): void => {
  logger.info(`Received ${signal} signal, shutting down gracefully`);
  app
    .stop()
    .then(() => process.exit(0))
    .catch(error => {
      logger.error('Failed to shut down cleanly', { error });
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });

  app.stop()
    .then(() => {
      logger.error('Server stopped after unhandled rejection');
      process.exit(1);
    })
    .catch((shutdownError) => {
      logger.error('Failed to gracefully shutdown after unhandled rejection', { shutdownError });
      process.exit(1);
    });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  app.stop()
    .then(() => {
      logger.error('Server stopped after uncaught exception');
      process.exit(1);
    })
    .catch((shutdownError) => {
      logger.error('Failed to gracefully shutdown after uncaught exception', { shutdownError });
      process.exit(1);
    });
});

// Start the application
app.start().catch(error => {
  logger.error('Failed to start application', { error });
  process.exit(1);
});
