import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_VERSION, env } from './config/env.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createCalculationRouter } from './routes/calculations.js';
import { createConfigRouter } from './routes/config.js';
import { createTranslationRouter } from './routes/translations.js';
import { getYearConfigStore, type YearConfigStore } from './tax/config/yearConfigStore.js';

export interface AppOptions {
  store?: YearConfigStore;
}

export function createApp(options: AppOptions = {}): Express {
  const store = options.store ?? getYearConfigStore();
  const app = express();

  // Security & parsing
  app.use(helmet());
  app.use(cors({ origin: env.CORS_ORIGIN }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime()
    });
  });

  app.use('/api/v1/calculations', createCalculationRouter(store));
  app.use('/api/v1/config', createConfigRouter(store));
  app.use('/api/v1/translations', createTranslationRouter());

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
