import type { Server } from 'node:http';
import { createServer } from 'node:http';

import { createApp } from './app';
import { connectToDatabase, disconnectFromDatabase, readDbHealth } from './config/db';
import { loadEnv, usesDevelopmentSessionSecret } from './config/env';
import { createMongoSessionStore } from './config/session';
import {
  countMarkerRecords,
  createMarkerRecord,
  listMarkerRecords,
  removeMarkerRecord,
  setMarkerActiveRecord,
  syncMarkerIndexes,
} from './models/marker';
import { countUserRecords, createUserRecords, findUserByUsername, syncUserIndexes } from './models/user';
import { hashPassword, verifyPassword } from './services/passwords';
import { runSeeders } from './services/seedService';

const processStartedAtMs = Date.now();

function processUptimeSec(): number {
  return Math.max(0, Number(((Date.now() - processStartedAtMs) / 1000).toFixed(3)));
}

function loadEnvOrExit(): ReturnType<typeof loadEnv> {
  try {
    return loadEnv();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[startup] Invalid environment configuration: ${reason}`);
    process.exit(1);
  }
}

async function prepareDatabase(): Promise<void> {
  await Promise.all([syncMarkerIndexes(), syncUserIndexes()]);
  await runSeeders({
    countMarkers: countMarkerRecords,
    createMarker: createMarkerRecord,
    countUsers: countUserRecords,
    createUsers: createUserRecords,
    hashPassword,
    now: () => new Date(),
  });
}

async function bootstrap(): Promise<void> {
  const env = loadEnvOrExit();

  if (usesDevelopmentSessionSecret(env)) {
    console.log('[startup] SESSION_SECRET not set, using the development secret');
  }

  try {
    await connectToDatabase(env.mongodbUri, { debug: env.debug });
    const db = readDbHealth();
    console.log(
      `[startup] MongoDB connected (state=${db.readyState}/${db.readyStateCode}, db=${db.dbName ?? 'unknown'}, host=${db.host ?? 'unknown'})`
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[startup] Failed to connect to MongoDB: ${reason}`);
    process.exit(1);
  }

  try {
    await prepareDatabase();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[startup] Failed to prepare database: ${reason}`);
    process.exit(1);
  }

  const app = createApp({
    getDbHealth: readDbHealth,
    listMarkers: listMarkerRecords,
    createMarker: createMarkerRecord,
    removeMarker: removeMarkerRecord,
    setMarkerActive: setMarkerActiveRecord,
    findUserByUsername,
    verifyPassword,
    now: () => new Date(),
    uptimeSec: processUptimeSec,
    corsOrigins: env.corsOrigins,
    authEnabled: env.authEnabled,
    sessionSecret: env.sessionSecret,
    secureCookie: env.nodeEnv === 'production',
    sessionStore: createMongoSessionStore(env.mongodbUri),
    geocoder: env.geocoder,
    geocoderApiKey: env.geocoderApiKey,
    debug: env.debug,
  });

  if (env.nodeEnv === 'production') {
    // Secure cookies are only issued when Express trusts the proxy's X-Forwarded-Proto.
    app.set('trust proxy', 1);
  }

  const server = createServer(app);
  server.listen(env.port, () => {
    console.log(`[startup] Listening on http://localhost:${env.port} (auth=${env.authEnabled ? 'on' : 'off'})`);
  });

  registerShutdown(server);
}

function registerShutdown(server: Server): void {
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[shutdown] Received ${signal}, closing server...`);
    server.close(async () => {
      try {
        await disconnectFromDatabase();
        console.log('[shutdown] MongoDB disconnected.');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[shutdown] Failed to disconnect MongoDB cleanly: ${reason}`);
      } finally {
        process.exit(0);
      }
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

void bootstrap();
