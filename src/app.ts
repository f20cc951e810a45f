/// <reference path="./types/express.d.ts" />

import cors from 'cors';
import express, { type ErrorRequestHandler } from 'express';
import multer from 'multer';
import type { AppConfig } from './config/env';
import { createAuthRouter } from './routes/authRoutes';
import { createItemRouter } from './routes/itemRoutes';
import type { ItemStore } from './services/itemStore';
import type { SessionService } from './services/sessionService';

export interface AppDependencies {
  config: Pick<AppConfig, 'jsonBodyLimit' | 'maxUploadBytes'>;
  items: ItemStore;
  sessions: SessionService;
}

const readStatus = (err: unknown) => {
  if (err instanceof multer.MulterError) return 400;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
};

export const createApp = ({ config, items, sessions }: AppDependencies) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(express.urlencoded({ extended: false, limit: config.jsonBodyLimit }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/auth', createAuthRouter(sessions));
  app.use('/items', createItemRouter(items, sessions, { maxUploadBytes: config.maxUploadBytes }));

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const status = readStatus(err);
    if (status >= 500) {
      console.error(err);
    }
    const message = status >= 500 || !(err instanceof Error) ? 'Internal server error' : err.message;
    res.status(status).json({ error: message });
  };

  app.use(errorHandler);

  return app;
};
