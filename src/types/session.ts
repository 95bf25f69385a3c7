import type { SessionUser } from './user';

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
  }
}
