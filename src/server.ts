/**
 * Health endpoint for liveness and readiness probes
 */

import { Server } from 'http';
import express from 'express';
import { CycleSummary } from './controller/controller';
import { createLogger } from './logger';

const logger = createLogger('health');

export function createHealthApp(lastCycle: () => CycleSummary | undefined): express.Express {
  const app = express();

  app.get('/healthz', (req, res) => {
    const cycle = lastCycle();
    if (!cycle) {
      res.status(503).json({ status: 'starting' });
      return;
    }
    res.json({ status: 'ok', lastCycle: cycle });
  });

  return app;
}

export function startHealthServer(app: express.Express, port: number): Server {
  return app.listen(port, () => {
    logger.info(`Health endpoint listening on :${port}`);
  });
}
