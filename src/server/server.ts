/**
 * Express application
 */

import express, { type Express } from 'express';
import cors from 'cors';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middleware';

export function createApp(): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(cors());

  app.use('/api', createApiRouter());

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
