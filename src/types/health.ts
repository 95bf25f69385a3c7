export type DbReadyStateName =
  | 'disconnected'
  | 'connected'
  | 'connecting'
  | 'disconnecting'
  | 'uninitialized';

export interface DatabaseHealth {
  connected: boolean;
  readyStateCode: number;
  readyState: DbReadyStateName;
  dbName?: string;
  host?: string;
}

export type HealthStatus = 'ok' | 'degraded';

export interface HealthSummary {
  status: HealthStatus;
}

export interface HealthResponse {
  status: HealthStatus;
  service: 'ewaste-map-backend';
  auth: 'enabled' | 'disabled';
  timestamp: string;
  uptimeSec: number;
  database: DatabaseHealth;
}
