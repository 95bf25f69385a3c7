import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_PORT = 5000;
const DEFAULT_NODE_ENV = 'development';
const DEFAULT_CORS_ORIGINS = ['http://localhost:5000', 'http://localhost:3000'];
const DEVELOPMENT_SESSION_SECRET = 'dev-session-secret-change-me';

type NodeEnv = 'development' | 'test' | 'production';

export const GEOCODER_PROVIDERS = ['nominatim', 'mapbox'] as const;

export type GeocoderProvider = (typeof GEOCODER_PROVIDERS)[number];

export interface EnvConfig {
  nodeEnv: NodeEnv;
  port: number;
  mongodbUri: string;
  sessionSecret: string;
  authEnabled: boolean;
  debug: boolean;
  geocoder: GeocoderProvider;
  geocoderApiKey: string;
  corsOrigins: string[];
}

export type RawEnv = Record<string, string | undefined>;

function parseNodeEnv(value: string | undefined): NodeEnv {
  const input = (value ?? DEFAULT_NODE_ENV).trim();
  if (input === 'development' || input === 'test' || input === 'production') {
    return input;
  }

  throw new Error(`Invalid NODE_ENV: ${value}. Expected development, test, or production.`);
}

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PORT;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid PORT: ${value}. Expected an integer between 1 and 65535.`);
  }

  return parsed;
}

function parseMongoUri(value: string | undefined): string {
  const uri = value?.trim();
  if (!uri) {
    throw new Error('MONGODB_URI is required.');
  }

  if (!(uri.startsWith('mongodb://') || uri.startsWith('mongodb+srv://'))) {
    throw new Error('MONGODB_URI must start with mongodb:// or mongodb+srv://');
  }

  return uri;
}

export function parseBooleanFlag(name: string, value: string | undefined, fallback: boolean): boolean {
  const input = value?.trim().toLowerCase();
  if (!input) {
    return fallback;
  }
  if (input === 'true' || input === '1' || input === 'yes') {
    return true;
  }
  if (input === 'false' || input === '0' || input === 'no') {
    return false;
  }

  throw new Error(`Invalid ${name}: ${value}. Expected true or false.`);
}

function parseSessionSecret(value: string | undefined, nodeEnv: NodeEnv): string {
  const secret = value?.trim();
  if (secret) {
    return secret;
  }

  if (nodeEnv === 'production') {
    throw new Error('SESSION_SECRET is required in production.');
  }

  return DEVELOPMENT_SESSION_SECRET;
}

function parseGeocoder(value: string | undefined): GeocoderProvider {
  const input = value?.trim().toLowerCase() || 'nominatim';
  const provider = GEOCODER_PROVIDERS.find((candidate) => candidate === input);
  if (!provider) {
    throw new Error(`Invalid GEOCODER: ${value}. Expected ${GEOCODER_PROVIDERS.join(' or ')}.`);
  }

  return provider;
}

function parseCorsOrigins(value: string | undefined): string[] {
  if (!value?.trim()) {
    return DEFAULT_CORS_ORIGINS;
  }

  const parsed = value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  if (parsed.length === 0) {
    throw new Error('CORS_ORIGINS must contain at least one comma-separated origin.');
  }

  return parsed;
}

export function usesDevelopmentSessionSecret(config: Pick<EnvConfig, 'sessionSecret'>): boolean {
  return config.sessionSecret === DEVELOPMENT_SESSION_SECRET;
}

export function loadEnv(source: RawEnv = process.env): EnvConfig {
  const nodeEnv = parseNodeEnv(source.NODE_ENV);
  return {
    nodeEnv,
    port: parsePort(source.PORT),
    mongodbUri: parseMongoUri(source.MONGODB_URI),
    sessionSecret: parseSessionSecret(source.SESSION_SECRET, nodeEnv),
    authEnabled: parseBooleanFlag('AUTH_ENABLED', source.AUTH_ENABLED, true),
    debug: parseBooleanFlag('DEBUG', source.DEBUG, false),
    geocoder: parseGeocoder(source.GEOCODER),
    geocoderApiKey: source.GEOCODER_API_KEY?.trim() ?? '',
    corsOrigins: parseCorsOrigins(source.CORS_ORIGINS),
  };
}
