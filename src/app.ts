import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import { errorMiddleware, notFoundHandler } from './middleware/error.middleware';
import { createAnalysisRoutes } from './models/analysis/analysis.routes';
import { AnalysisService } from './models/analysis/analysis.service';

export interface AppOptions {
  analysisService?: AnalysisService;
}

export function createApp(options: AppOptions = {}) {
  const app = express();

  // Basic middleware
  app.use(cors({ origin: env.CORS_ORIGIN === '*' ? true : env.CORS_ORIGIN.split(','), credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/', createAnalysisRoutes(options.analysisService));

  // Error handling
  app.use('*', notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
