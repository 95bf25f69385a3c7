import { type NextFunction, type Request, type RequestHandler, type Response, Router } from 'express';

import { SESSION_COOKIE_NAME } from '../config/session';
import { type AuthenticateDeps, INVALID_CREDENTIALS_MESSAGE, authenticateUser } from '../services/authService';
import type { SessionUser } from '../types/user';
import { renderLoginPage } from '../views/pages';

export type AuthRouteDeps = AuthenticateDeps;

type LoginResult =
  | { kind: 'authenticated'; user: SessionUser }
  | { kind: 'rejected'; statusCode: 400 | 401; html: string };

function readUsername(payload: unknown): string {
  if (typeof payload === 'object' && payload !== null && 'username' in payload) {
    return typeof payload.username === 'string' ? payload.username.trim() : '';
  }
  return '';
}

export async function processLoginRequest(payload: unknown, deps: AuthenticateDeps): Promise<LoginResult> {
  const result = await authenticateUser(payload, deps);
  if (result.ok) {
    return { kind: 'authenticated', user: result.user };
  }

  const username = readUsername(payload);
  if (result.code === 'MISSING_CREDENTIALS') {
    return {
      kind: 'rejected',
      statusCode: 400,
      html: renderLoginPage({ error: 'Username and password are required', username }),
    };
  }

  return {
    kind: 'rejected',
    statusCode: 401,
    html: renderLoginPage({ error: INVALID_CREDENTIALS_MESSAGE, username }),
  };
}

function startSession(request: Request, response: Response, next: NextFunction, user: SessionUser): void {
  // A fresh id on login, so a session id planted before login is worthless.
  request.session.regenerate((regenerateError) => {
    if (regenerateError) {
      next(regenerateError);
      return;
    }

    request.session.user = user;
    request.session.save((saveError) => {
      if (saveError) {
        next(saveError);
        return;
      }
      console.log('[auth] login', { requestId: response.locals.requestId, username: user.username, role: user.role });
      response.redirect('/');
    });
  });
}

export function createAuthRouter(deps: AuthRouteDeps): Router {
  const router = Router();

  const loginFormHandler: RequestHandler = (request, response) => {
    if (request.session.user) {
      response.redirect('/');
      return;
    }
    response.status(200).type('html').send(renderLoginPage());
  };

  const loginHandler: RequestHandler = async (request, response, next) => {
    let result: LoginResult;
    try {
      result = await processLoginRequest(request.body, deps);
    } catch (error) {
      next(error);
      return;
    }

    if (result.kind === 'rejected') {
      console.log('[auth] login rejected', { requestId: response.locals.requestId, status: result.statusCode });
      response.status(result.statusCode).type('html').send(result.html);
      return;
    }

    startSession(request, response, next, result.user);
  };

  const logoutHandler: RequestHandler = (request, response, next) => {
    const username = request.session.user?.username;
    request.session.destroy((error) => {
      if (error) {
        next(error);
        return;
      }
      if (username) {
        console.log('[auth] logout', { requestId: response.locals.requestId, username });
      }
      response.clearCookie(SESSION_COOKIE_NAME);
      response.redirect('/login');
    });
  };

  router.get('/login', loginFormHandler);
  router.post('/login', loginHandler);
  router.get('/logout', logoutHandler);

  return router;
}
