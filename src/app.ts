import express from 'express';
import type { Express } from 'express';
import cors from 'cors';

import { errorMessage } from './observability/logger';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { applyRequestTracing } from './observability/requestTracing';
import { createCatalogRouter } from './routes/catalog';
import { createSatellitesRouter } from './routes/satellites';
import type { SatelliteService } from './services/satelliteService';

export interface AppDependencies {
  service: SatelliteService;
}

export function createApp({ service }: AppDependencies): Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());

  app.use('/api/satellites', createSatellitesRouter(service));
  app.use('/api', createCatalogRouter(service));

  app.get('/', (_req, res) => {
    res.send('Orbit Catalog – API UpHere');
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err: unknown) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}
