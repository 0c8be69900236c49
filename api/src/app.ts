import express, { Express } from 'express';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createApiRouter } from './routes';
import type { ServiceContext } from './services/context';

export function createApp(ctx: ServiceContext, config: AppConfig): Express {
  const app = express();

  // CORS for the school administration frontend
  app.use(cors({
    origin: config.corsOrigin,
    credentials: true,
  }));

  // Body parsing; CSV uploads use their own raw parser
  app.use(express.json({ limit: '1mb' }));

  // Request logging with pino-http
  app.use(pinoHttp({
    logger: ctx.logger,
    genReqId: () => uuidv4(),
    serializers: {
      req: (req) => ({
        method: req.method,
        url: req.url,
        query: req.query,
      }),
      res: (res) => ({
        statusCode: res.statusCode,
      }),
    },
  }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.use('/api/v1', createApiRouter(ctx, config.uploadLimit));

  // Error handler
  app.use(errorHandler(ctx.logger, config.nodeEnv !== 'production'));

  return app;
}
