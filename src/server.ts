import express from 'express';
import { Server } from 'node:http';
import { WebhookRoutes } from './routes/webhook';
import { DeploymentService } from './services/deployment';
import { RestartCoordinator, TouchFileTrigger } from './services/restart';
import { RepositorySynchronizer, ServerConfiguration } from './types';
import { GitManager } from './utils/git';
import { Logger, createLogger } from './utils/logger';

export const SERVICE_NAME = 'git-webhook-deployer';
export const SERVICE_VERSION = '1.0.0';

export interface AppOptions {
  debug: boolean;
  logger: Logger;
}

export function createApp(webhookRoutes: WebhookRoutes, options: AppOptions): express.Express {
  const { logger } = options;
  const app = express();

  // Request logging
  app.use((req, res, next) => {
    const ip = req.ip || req.socket.remoteAddress || 'Unknown';
    logger.info(`📥 ${req.method} ${req.path} - IP: ${ip} - User-Agent: ${req.get('User-Agent') || 'Unknown'}`);

    if (options.debug) {
      logger.debug('📋 Headers:', JSON.stringify(req.headers, null, 2));
    }

    res.on('finish', () => {
      logger.info(`📤 Response ${res.statusCode} for ${req.method} ${req.path}`);
    });

    next();
  });

  app.post(/^\/webhook\/(.*)$/, (req, res) => {
    void webhookRoutes.handleWebhook(req, res);
  });

  app.get('/health', (req, res) => {
    webhookRoutes.healthCheck(req, res);
  });

  app.get('/', (req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'running',
      endpoints: {
        webhook: 'POST /webhook/{subpath}',
        health: 'GET /health',
      },
    });
  });

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      logger.error('Unhandled error:', err);
      next(err);
      return;
    }

    // Malformed percent-encoding in the subpath is rejected by the router with status 400
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500 && req.path.startsWith('/webhook/')) {
      logger.error(`Invalid repository path: ${req.path}`);
      res.status(400).json({ status: 'error', message: 'Invalid repository path' });
      return;
    }

    logger.error('Unhandled error:', err);
    res.status(500).json({ status: 'error', message: 'Internal server error' });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      status: 'error',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  return app;
}

export interface RunningServer {
  server: Server;
  restartCoordinator: RestartCoordinator;
  close(): Promise<void>;
}

export interface ServerDependencies {
  logger?: Logger;
  synchronizer?: RepositorySynchronizer;
}

/**
 * Wire the components together, start the restart loop and listen.
 */
export function startServer(config: ServerConfiguration, deps: ServerDependencies = {}): Promise<RunningServer> {
  const logger = deps.logger ?? createLogger({ debug: config.debug });
  const synchronizer = deps.synchronizer ?? new GitManager(config.gitTimeoutMs, logger);
  const restartCoordinator = new RestartCoordinator(
    new TouchFileTrigger(config.restartTriggerFile),
    logger,
    config.pollIntervalMs,
  );
  const deploymentService = new DeploymentService(config, synchronizer, restartCoordinator, logger);
  const app = createApp(new WebhookRoutes(deploymentService, logger), { debug: config.debug, logger });

  if (config.securityToken === undefined) {
    logger.warn('⚠️  No security token configured: webhook authentication is disabled');
  }
  if (config.debug) {
    logger.warn('⚠️  Debug mode is on: tokens and headers will be logged');
  }

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      restartCoordinator.start();
      logger.info(`🚀 ${SERVICE_NAME} started on port ${config.port}`);
      logger.info(`📁 Repository root: ${config.repositoryRoot}`);
      logger.info(`🔁 Restart trigger: ${config.restartTriggerFile}`);
      resolve({
        server,
        restartCoordinator,
        close: () =>
          new Promise<void>((done, fail) => {
            restartCoordinator.stop();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
    server.once('error', reject);
  });
}
