import { randomUUID } from 'node:crypto';
import path from 'node:path';

import cors from 'cors';
import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import type { Store } from 'express-session';

import type { GeocoderProvider } from './config/env';
import { createSessionMiddleware } from './config/session';
import { requireAuthentication } from './middleware/auth';
import { createAuthRouter } from './routes/auth';
import { createLivenessRouter, createHealthRouter } from './routes/health';
import { createMarkersRouter } from './routes/markers';
import { createPagesRouter } from './routes/pages';
import type { DatabaseHealth } from './types/health';
import type { CreateMarkerPersistenceInput, ErrorResponse, MarkerRecord } from './types/marker';
import type { UserRecord } from './types/user';
import './types/session';

const DEFAULT_STATIC_DIR = path.resolve(__dirname, '..', 'static');

interface CreateAppDeps {
  getDbHealth: () => DatabaseHealth;
  listMarkers: () => Promise<MarkerRecord[]>;
  createMarker: (input: CreateMarkerPersistenceInput) => Promise<MarkerRecord>;
  removeMarker: (markerId: number) => Promise<{ removed: boolean }>;
  setMarkerActive: (markerId: number, isActive: boolean) => Promise<MarkerRecord | null>;
  findUserByUsername: (username: string) => Promise<UserRecord | null>;
  verifyPassword: (password: string, passwordHash: string) => Promise<boolean>;
  now: () => Date;
  uptimeSec: () => number;
  corsOrigins: string[];
  authEnabled: boolean;
  sessionSecret: string;
  secureCookie: boolean;
  sessionStore?: Store;
  geocoder: GeocoderProvider;
  geocoderApiKey: string;
  debug: boolean;
  staticDir?: string;
}

const requestLogger: RequestHandler = (request, response, next) => {
  const startedAt = process.hrtime.bigint();
  response.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    console.log(
      `[http] ${request.method} ${request.originalUrl} ${response.statusCode} ${durationMs.toFixed(1)}ms`,
      { requestId: response.locals.requestId }
    );
  });
  next();
};

const notFoundHandler: RequestHandler = (_request, response) => {
  const body: ErrorResponse = { error: 'Resource not found' };
  response.status(404).json(body);
};

interface ClientError {
  status: number;
  message: string;
}

/** body-parser failures (bad JSON, oversized or unsupported bodies) carry an exposed 4xx status. */
function readClientError(error: unknown): ClientError | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if ('type' in error && error.type === 'entity.parse.failed') {
    return { status: 400, message: 'Malformed JSON body' };
  }

  const status = 'status' in error ? error.status : undefined;
  const expose = 'expose' in error ? error.expose : false;
  const message = 'message' in error ? error.message : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500 && expose === true && typeof message === 'string') {
    return { status, message };
  }
  return null;
}

const errorHandler: ErrorRequestHandler = (error, _request, response, _next) => {
  const clientError = readClientError(error);
  if (clientError) {
    const body: ErrorResponse = { error: clientError.message };
    response.status(clientError.status).json(body);
    return;
  }

  const reason = error instanceof Error ? error.message : String(error);
  console.error('[http] Unhandled error', { requestId: response.locals.requestId, reason });
  const body: ErrorResponse = { error: 'Internal server error' };
  response.status(500).json(body);
};

export function createApp({
  getDbHealth,
  listMarkers,
  createMarker,
  removeMarker,
  setMarkerActive,
  findUserByUsername,
  verifyPassword,
  now,
  uptimeSec,
  corsOrigins,
  authEnabled,
  sessionSecret,
  secureCookie,
  sessionStore,
  geocoder,
  geocoderApiKey,
  debug,
  staticDir = DEFAULT_STATIC_DIR,
}: CreateAppDeps) {
  const app = express();

  const allowedOrigins = new Set(corsOrigins);

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || allowedOrigins.has(origin)) {
          callback(null, true);
          return;
        }

        callback(new Error(`Origin not allowed by CORS: ${origin}`));
      },
    })
  );

  app.use((_request, response, next) => {
    const requestId = randomUUID();
    response.locals.requestId = requestId;
    response.setHeader('X-Request-Id', requestId);
    next();
  });

  if (debug) {
    app.use(requestLogger);
  }

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Reachable without a session: the liveness check and the assets the login page needs.
  app.use(createLivenessRouter({ getDbHealth }));
  app.use('/static', express.static(staticDir));

  app.use(createSessionMiddleware({ secret: sessionSecret, secureCookie, store: sessionStore }));

  if (authEnabled) {
    app.use(createAuthRouter({ findUserByUsername, verifyPassword }));
    app.use(requireAuthentication);
  }

  app.use(createHealthRouter({ getDbHealth, now, uptimeSec, authEnabled }));
  app.use(createPagesRouter({ geocoder, geocoderApiKey }));
  app.use(
    createMarkersRouter({
      now,
      listMarkers,
      createMarker,
      removeMarker,
      setMarkerActive,
      authEnabled,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
