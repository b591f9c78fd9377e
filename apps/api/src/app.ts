import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';

import { injectRouter } from './controllers/inject.controller.js';
import { experimentsRouter } from './controllers/experiments.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { loadChaosConfig } from './config/chaos.js';
import { ChaosRuntime } from './services/chaos-runtime.js';

export function buildApp(): ReturnType<typeof express> {
  const config = loadChaosConfig();
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  if (process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/inject', injectRouter);
  app.use('/api/experiments', experimentsRouter);

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      runtime: ChaosRuntime.getInstance() ? 'initialized' : 'lazy',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>) {
  const { seed } = loadChaosConfig();
  const runtime = ChaosRuntime.init({ seed });
  const httpServer = createServer(app);
  return { httpServer, runtime };
}
