import express, { Application, Request, Response } from 'express';
import { createRouter } from './routes/index.js';
import { errorHandler, requestLogger } from './middleware/index.js';
import type { AppServices } from './services/index.js';

export const createApp = (services: AppServices): Application => {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(requestLogger);

  app.use('/api', createRouter(services));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Centralized error handling middleware
  app.use(errorHandler);

  return app;
};
