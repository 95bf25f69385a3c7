import mongoose from 'mongoose';

import type { DatabaseHealth, DbReadyStateName } from '../types/health';

const READY_STATE_NAME: Record<number, DbReadyStateName> = {
  0: 'disconnected',
  1: 'connected',
  2: 'connecting',
  3: 'disconnecting',
};

export interface ConnectOptions {
  /** Logs every query Mongoose sends. */
  debug?: boolean;
}

function mapReadyState(code: number): DbReadyStateName {
  return READY_STATE_NAME[code] ?? 'uninitialized';
}

export async function connectToDatabase(uri: string, { debug = false }: ConnectOptions = {}): Promise<void> {
  // Query filters built from request values must not smuggle in operators like $ne.
  mongoose.set('sanitizeFilter', true);
  mongoose.set('strictQuery', true);
  if (debug) {
    mongoose.set('debug', (collection: string, method: string, ...args: unknown[]) => {
      console.log(`[db] ${collection}.${method}`, args);
    });
  }

  await mongoose.connect(uri, {
    serverSelectionTimeoutMS: 5000,
  });
}

export async function disconnectFromDatabase(): Promise<void> {
  await mongoose.disconnect();
}

export function readDbHealth(): DatabaseHealth {
  const readyStateCode = mongoose.connection.readyState;

  return {
    connected: readyStateCode === 1,
    readyStateCode,
    readyState: mapReadyState(readyStateCode),
    dbName: mongoose.connection.name || undefined,
    host: mongoose.connection.host || undefined,
  };
}
