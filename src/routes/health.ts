import { type RequestHandler, Router } from 'express';

import type { DatabaseHealth, HealthResponse, HealthStatus, HealthSummary } from '../types/health';

export interface HealthRouteDeps {
  getDbHealth: () => DatabaseHealth;
  now: () => Date;
  uptimeSec: () => number;
  authEnabled: boolean;
}

type HealthStatusCode = 200 | 503;

const SERVICE_NAME: HealthResponse['service'] = 'ewaste-map-backend';

function readStatus(database: DatabaseHealth): { statusCode: HealthStatusCode; status: HealthStatus } {
  return database.connected ? { statusCode: 200, status: 'ok' } : { statusCode: 503, status: 'degraded' };
}

/** Public body: liveness only, nothing about the database. */
export function buildHealthSummary({ getDbHealth }: Pick<HealthRouteDeps, 'getDbHealth'>): {
  statusCode: HealthStatusCode;
  body: HealthSummary;
} {
  const { statusCode, status } = readStatus(getDbHealth());
  return { statusCode, body: { status } };
}

/** 503 while MongoDB is unreachable so the orchestrator restarts the service. */
export function buildHealthResponse({ getDbHealth, now, uptimeSec, authEnabled }: HealthRouteDeps): {
  statusCode: HealthStatusCode;
  body: HealthResponse;
} {
  const database = getDbHealth();
  const { statusCode, status } = readStatus(database);
  return {
    statusCode,
    body: {
      status,
      service: SERVICE_NAME,
      auth: authEnabled ? 'enabled' : 'disabled',
      timestamp: now().toISOString(),
      uptimeSec: uptimeSec(),
      database,
    },
  };
}

/** `GET /health`, mounted ahead of the session guard. */
export function createLivenessRouter(deps: Pick<HealthRouteDeps, 'getDbHealth'>): Router {
  const router = Router();

  const handler: RequestHandler = (_request, response) => {
    const result = buildHealthSummary(deps);
    response.status(result.statusCode).json(result.body);
  };

  router.get('/health', handler);
  return router;
}

/** `GET /api/health` with database details; sits behind the session guard like the rest of the API. */
export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  const handler: RequestHandler = (_request, response) => {
    const result = buildHealthResponse(deps);
    response.status(result.statusCode).json(result.body);
  };

  router.get('/api/health', handler);
  return router;
}
