import express from 'express';
import { HealthController, StatusController } from './controllers';
import type { EngineStatusSource, TransportStatusSource } from './controllers';

export type StatusSource = EngineStatusSource & TransportStatusSource;

export const createApiRoutes = (engine: StatusSource): express.Router => {
  const router = express.Router();
  const health = new HealthController(engine);
  const status = new StatusController(engine);

  router.get('/health', health.healthCheck.bind(health));
  router.get('/accounts', status.accounts.bind(status));
  router.get('/calls', status.calls.bind(status));

  return router;
};

export default createApiRoutes;
