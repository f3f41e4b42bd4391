import express, { type Express } from 'express';
import { createServer, type Server as HttpServer } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import { env } from './config/environment';
import { createRequestLogger, logger, resolveRequestId } from './config/logger';
import { errorHandler, notFoundHandler } from './api/middleware/error-handler.middleware';
import { adminRateLimiter } from './api/middleware/rate-limit.middleware';
import { checkDatabaseHealth, closeDatabaseConnection } from './db';
import authRoutes from './api/routes/auth.routes';
import adminUsersRoutes from './api/routes/admin-users.routes';
import { createAdminVolunteerRoutes, createVolunteerRoutes } from './api/routes/volunteers.routes';
import { adminDirectoryService } from './services/admin/admin-directory.service';
import { loadTaxonomy, type MinistryTaxonomy } from './services/ministry/taxonomy';
import { VolunteerService } from './services/volunteers/volunteer.service';
import { migrate } from './database/migrate';

export interface AppDependencies {
  taxonomy: MinistryTaxonomy;
}

/**
 * Create Express application with middleware
 */
function createApp({ taxonomy }: AppDependencies): Express {
  const app = express();
  const volunteerService = new VolunteerService(taxonomy);

  app.set('trust proxy', 1);

  app.use(helmet());
  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true,
    })
  );

  app.use(express.json({ limit: '100kb' }));
  app.use(cookieParser());

  // Request-scoped logging
  app.use((req, res, next) => {
    const requestId = resolveRequestId(req.headers['x-request-id']);
    const requestLogger = createRequestLogger(requestId, req.method, req.path);
    const startedAt = Date.now();

    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      requestLogger.debug(
        { statusCode: res.statusCode, durationMs: Date.now() - startedAt },
        'Request completed'
      );
    });
    next();
  });

  app.get('/health', (_req, res) => {
    const database = checkDatabaseHealth();
    res.status(database ? 200 : 503).json({
      status: database ? 'ok' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/api', createVolunteerRoutes(volunteerService));

  app.use('/api/admin', adminRateLimiter);
  app.use('/api/admin', authRoutes);
  app.use('/api/admin/users', adminUsersRoutes);
  app.use('/api/admin/volunteers', createAdminVolunteerRoutes(volunteerService));

  app.use('/api/*', notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Start server
 */
function startServer(app: Express): HttpServer {
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server started successfully');
  });

  return httpServer;
}

/**
 * Graceful shutdown handler
 */
function setupGracefulShutdown(httpServer: HttpServer): void {
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    httpServer.close((error) => {
      if (error) {
        logger.error({ error }, 'Error closing HTTP server');
      }
      closeDatabaseConnection();
      logger.info('Graceful shutdown completed');
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled promise rejection');
    process.exit(1);
  });
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info(
    { logLevel: env.LOG_LEVEL, nodeEnv: env.NODE_ENV, port: env.PORT },
    'Starting volunteer signup backend...'
  );

  await migrate();

  const taxonomy = await loadTaxonomy();

  const superAdmins = await adminDirectoryService.countActiveSuperAdmins();
  if (superAdmins === 0) {
    logger.warn('No active super admin exists; run the seed script or repair the data manually');
  }

  const httpServer = startServer(createApp({ taxonomy }));
  setupGracefulShutdown(httpServer);
}

// Start application if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  });
}

export { createApp, startServer };
