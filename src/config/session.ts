import MongoStore from 'connect-mongo';
import session, { type Store } from 'express-session';
import type { RequestHandler } from 'express';

export const SESSION_COOKIE_NAME = 'ewaste.sid';

const SESSION_TTL_SECONDS = 8 * 60 * 60;

export interface SessionOptions {
  secret: string;
  secureCookie: boolean;
  /** Omitted in tests, where express-session's in-process store is enough. */
  store?: Store;
}

export function createMongoSessionStore(mongoUrl: string): Store {
  return MongoStore.create({
    mongoUrl,
    collectionName: 'sessions',
    ttl: SESSION_TTL_SECONDS,
  });
}

export function createSessionMiddleware({ secret, secureCookie, store }: SessionOptions): RequestHandler {
  return session({
    name: SESSION_COOKIE_NAME,
    secret,
    store,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: secureCookie,
      maxAge: SESSION_TTL_SECONDS * 1000,
    },
  });
}
