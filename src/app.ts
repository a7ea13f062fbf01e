import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { routes } from './routes/index';
import { notFound } from './middlewares/notFound';
import { errorHandler } from './middlewares/errorHandler';
import { env } from './config/env';

export function createApp() {
  const app = express();

  app.use(helmet());

  // Public read-mostly API; no credentials are involved
  app.use(cors({
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  }));

  // Body parsing and logging
  app.use(express.json({ limit: '100kb' }));
  if (env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  app.use('/api', routes);

  // Error handling
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
