import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import { ConfigManager, validateConfig } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { createPipeline, Pipeline, PipelineOverrides } from './services/orchestrator/Pipeline.js';
import { checkRequiredBinaries } from './utils/binaryCheck.js';
import { securityMiddleware, rateLimitByIp } from './middleware/security.js';
import { requestLoggingMiddleware, errorLoggingMiddleware, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { RATE_LIMITS } from './config/constants.js';
import { createApiRouter } from './routes/api.js';
import { getErrorMessage } from './utils/errorHandling.js';

export class App {
  public express: express.Application;
  public readonly pipeline: Pipeline;
  private httpServer: HttpServer;
  private config: AppConfig;
  private started = false;

  constructor(config: AppConfig = ConfigManager.getInstance().getConfig(), overrides: PipelineOverrides = {}) {
    this.config = config;
    this.express = express();
    this.httpServer = createServer(this.express);
    this.pipeline = createPipeline(config, overrides);

    this.initializeMiddleware();
    this.initializeRoutes();
    // Error handling MUST be registered after all routes
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    // Trust proxy for rate limiting and IP detection
    this.express.set('trust proxy', 1);

    this.express.use(securityMiddleware);

    this.express.use(
      cors({
        origin: this.config.server.env === 'development',
        credentials: true,
      })
    );

    this.express.use(express.json({ limit: '1mb' }));

    if (this.config.server.env !== 'test') {
      this.express.use(requestLoggingMiddleware);
    }

    this.express.use('/api', rateLimitByIp(RATE_LIMITS.API_WINDOW, RATE_LIMITS.API_MAX_REQUESTS));
  }

  private initializeRoutes(): void {
    // Health check endpoint (no external commands)
    this.express.get('/health', (_req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
        watchers: this.pipeline.watchers.status(),
      });
    });

    this.express.use('/api', createApiRouter(this.pipeline));
  }

  private initializeErrorHandling(): void {
    this.express.use(errorLoggingMiddleware);
    this.express.use(notFoundHandler);
    this.express.use(errorHandler);
  }

  public async start(): Promise<void> {
    validateConfig(this.config);

    await checkRequiredBinaries([
      { name: this.config.tagger.command, required: true, purpose: 'Import, lyrics and statistics' },
      { name: this.config.playback.command, required: false, purpose: 'Playlist push' },
      {
        name: this.config.catalog.regenerateCommand[0] ?? 'regenerate-albums',
        required: false,
        purpose: 'Catalog regeneration',
      },
    ]);

    const { watchers, workerPool, cleanup, context } = this.pipeline;

    // Missing roots disable their workers before anything starts
    await watchers.checkRoots();

    workerPool.start();
    logger.info('Worker pool started');

    watchers.start();
    logger.info('File watchers started');

    if (this.config.cleanup.enabled) {
      cleanup.start();
      logger.info('Inbox cleanup scheduler started');
    }

    await new Promise<void>((resolve, reject) => {
      const { port, host } = this.config.server;
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        logger.info(`Library conductor started on ${host}:${port}`);
        logger.info(`Environment: ${this.config.server.env}`);
        resolve();
      });
    });

    this.started = true;
    context.eventLog.append('info', 'Orchestrator started');
  }

  public async stop(): Promise<void> {
    try {
      const { watchers, workerPool, cleanup, context } = this.pipeline;

      cleanup.stop();
      await watchers.stop();
      logger.info('File watchers stopped');

      // In-flight jobs finish before this resolves
      await workerPool.stop();
      await this.pipeline.handlers.library.waitForManualImport();

      await context.importLease.release();

      if (this.started) {
        await new Promise<void>((resolve, reject) => {
          this.httpServer.close(error => (error ? reject(error) : resolve()));
        });
        this.started = false;
      }
      logger.info('Server stopped gracefully');
    } catch (error) {
      logger.error('Error during server shutdown', { error: getErrorMessage(error) });
    }
  }
}
