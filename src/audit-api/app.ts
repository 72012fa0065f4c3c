import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import { config } from './config';
import type { ApiContext } from './context';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export function createApp(ctx: ApiContext): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: config.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (config.nodeEnv !== 'test') {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, createApiRouter(ctx));
  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
