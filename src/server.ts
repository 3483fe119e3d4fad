import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import { createServer, Server as HttpServer } from 'http';

import { AppConfig, loadConfigFromEnvironment } from '@/config/env';
import { DatabaseService } from '@/config/database';
import logger from '@/config/logger';
import { createApiRouter } from '@/controllers/api';
import { createError, errorHandler } from '@/middleware/errorHandler';
import { StatsSynthesizer } from '@/services/StatsSynthesizer';
import { createDocumentStore } from '@/store';
import { DocumentStore, ErrorResponse, HealthCheckResult } from '@/types';

export interface ServerDependencies {
  store: DocumentStore;
  database?: DatabaseService;
  synthesizer?: StatsSynthesizer;
}

class Server {
  private app: express.Application;
  private httpServer: HttpServer;
  private store: DocumentStore;
  private database?: DatabaseService;
  private isShuttingDown: boolean = false;

  constructor(private readonly config: AppConfig, deps: ServerDependencies = createDocumentStore(config)) {
    this.app = express();
    this.httpServer = createServer(this.app);
    this.store = deps.store;
    this.database = deps.database;

    this.setupMiddleware();
    this.setupRoutes(deps.synthesizer);
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(helmet());

    this.app.use(cors({
      origin: this.getCorsOrigins(),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      credentials: true,
      maxAge: 86400 // 24 hours
    }));

    this.app.use(compression({
      filter: (req: express.Request, res: express.Response) => {
        if (req.headers['x-no-compression']) {
          return false;
        }
        return compression.filter(req, res);
      },
      level: 6,
      threshold: 1024
    }));

    this.app.use(morgan(this.getMorganFormat(), {
      stream: {
        write: (message: string) => logger.info(message.trim())
      },
      skip: (req: express.Request) => {
        return this.config.nodeEnv === 'test' ||
          (this.config.nodeEnv === 'production' && req.url === '/health');
      }
    }));

    this.app.use(express.json({
      limit: '1mb',
      strict: true,
      type: ['application/json', 'application/*+json']
    }));

    // next() has already run by the time the socket times out, so the 408 is written here
    this.app.use((req: express.Request, res: express.Response, next: express.NextFunction) => {
      res.setTimeout(this.config.requestTimeoutMs, () => {
        if (!res.headersSent) {
          errorHandler(createError('Request timeout', 408, 'REQUEST_TIMEOUT'), req, res, next);
        }
      });
      next();
    });
  }

  private setupRoutes(synthesizer?: StatsSynthesizer): void {
    this.app.get('/health', async (_req: express.Request, res: express.Response): Promise<void> => {
      const health = await this.performHealthCheck();
      res.status(health.status === 'healthy' ? 200 : 503).json(health);
    });

    this.app.get('/ready', (_req: express.Request, res: express.Response): void => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting down' });
      } else {
        res.json({ status: 'ready' });
      }
    });

    this.app.use('/', createApiRouter({ store: this.store, config: this.config, synthesizer }));

    this.app.use((req: express.Request, res: express.Response): void => {
      const response: ErrorResponse = {
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: `Endpoint not found: ${req.method} ${req.originalUrl}`
        },
        timestamp: new Date()
      };
      res.status(404).json(response);
    });
  }

  private setupErrorHandling(): void {
    // must stay the last middleware
    this.app.use(errorHandler);
  }

  private registerProcessHandlers(): void {
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Promise Rejection:', { reason });
      if (this.config.nodeEnv === 'production') {
        void this.gracefulShutdown();
      }
    });

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception:', error);
      void this.gracefulShutdown();
    });

    process.on('SIGTERM', () => {
      logger.info('SIGTERM received');
      void this.gracefulShutdown();
    });

    process.on('SIGINT', () => {
      logger.info('SIGINT received');
      void this.gracefulShutdown();
    });
  }

  private async performHealthCheck(): Promise<HealthCheckResult> {
    const startTime = Date.now();
    const database = await this.store.healthCheck();

    logger.debug(`Health check completed in ${Date.now() - startTime}ms`);

    return {
      status: database ? 'healthy' : 'unhealthy',
      checks: {
        database,
        timestamp: new Date().toISOString(),
        uptime: Math.floor(process.uptime()),
        version: process.env.npm_package_version || '1.0.0'
      },
      environment: this.config.nodeEnv
    };
  }

  private getCorsOrigins(): string | string[] {
    const origins = this.config.corsOrigin;

    if (!origins || origins === '*') {
      return '*';
    }

    return origins.split(',').map(origin => origin.trim());
  }

  private getMorganFormat(): string {
    return this.config.nodeEnv === 'production'
      ? 'combined'
      : ':method :url :status :res[content-length] - :response-time ms';
  }

  /** Binds the HTTP server; port 0 picks a free port. Resolves to the bound port. */
  async listen(port: number = this.config.port): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      const onError = (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error(`❌ Port ${port} is already in use`);
        } else {
          logger.error('❌ Server error:', error);
        }
        reject(error);
      };

      this.httpServer.once('error', onError);
      this.httpServer.listen(port, '0.0.0.0', () => {
        this.httpServer.off('error', onError);
        resolve();
      });
    });

    this.httpServer.keepAliveTimeout = 65000;
    this.httpServer.headersTimeout = 66000;

    const address = this.httpServer.address();
    return typeof address === 'object' && address !== null ? address.port : port;
  }

  async start(): Promise<void> {
    try {
      logger.info('Starting server initialization...');
      this.registerProcessHandlers();

      if (this.database) {
        const connected = await this.database.healthCheck();
        if (connected) {
          logger.info('✅ Database connection established');
        } else {
          logger.warn('⚠️  Database unreachable, /stats will serve fallback values until it returns');
        }
      } else {
        logger.warn('Using the in-memory document store, data is lost on restart');
      }

      const port = await this.listen();
      logger.info(`🚀 Server running on port ${port}`);
      logger.info(`📊 Environment: ${this.config.nodeEnv}`);
      logger.info(`🔗 Health check: http://localhost:${port}/health`);
    } catch (error) {
      logger.error('❌ Failed to start server:', error);
      await this.close().catch((closeError: unknown) => {
        logger.error('Error while cleaning up after failed start:', closeError);
      });
      throw error;
    }
  }

  /** Stops accepting connections and closes the store without exiting the process. */
  async close(): Promise<void> {
    this.isShuttingDown = true;
    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
        this.httpServer.closeIdleConnections();
      });
    }
    await this.store.close();
  }

  private async gracefulShutdown(): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress...');
      return;
    }

    logger.info('🔄 Starting graceful shutdown...');

    const shutdownTimer = setTimeout(() => {
      logger.error('⏰ Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, this.config.shutdownTimeoutMs);

    try {
      await this.close();
      clearTimeout(shutdownTimer);
      logger.info('✅ Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      clearTimeout(shutdownTimer);
      logger.error('❌ Error during shutdown:', error);
      process.exit(1);
    }
  }

  public getApp(): express.Application {
    return this.app;
  }

  public getHttpServer(): HttpServer {
    return this.httpServer;
  }
}

export { Server };

if (require.main === module) {
  const server = new Server(loadConfigFromEnvironment());
  server.start().catch((error: unknown) => {
    logger.error('Failed to start application:', error);
    process.exit(1);
  });
}
