import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import { protocolRouter } from './routes/protocol.route.js';
import { reportRouter } from './routes/report.route.js';
import { errorHandler } from './middleware/error.middleware.js';

export function createApp() {
  const app = express();

  app.use(cors({ origin: config.corsOrigin === '*' ? true : config.corsOrigin }));
  app.use(express.json({ limit: '100kb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/protocols', protocolRouter);
  app.use('/api/report', reportRouter);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
