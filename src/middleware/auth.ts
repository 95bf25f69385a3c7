import type { RequestHandler } from 'express';

import type { ErrorResponse } from '../types/marker';
import { isAdmin } from '../types/user';

export const LOGIN_PATH = '/login';

function isApiPath(path: string): boolean {
  return path === '/api' || path.startsWith('/api/');
}

/**
 * Lets a request through only when its session holds a user. API callers get
 * a 401 body; page requests are sent to the login form.
 */
export const requireAuthentication: RequestHandler = (request, response, next) => {
  if (request.session.user) {
    next();
    return;
  }

  if (isApiPath(request.path)) {
    const body: ErrorResponse = { error: 'Authentication required' };
    response.status(401).json(body);
    return;
  }

  response.redirect(LOGIN_PATH);
};

/** Must run before any handler that writes, so a denied request changes nothing. */
export const requireAdmin: RequestHandler = (request, response, next) => {
  const user = request.session.user;
  if (!user) {
    const body: ErrorResponse = { error: 'Authentication required' };
    response.status(401).json(body);
    return;
  }

  if (!isAdmin(user)) {
    console.log('[auth] admin route denied', {
      requestId: response.locals.requestId,
      username: user.username,
      method: request.method,
      path: request.path,
    });
    const body: ErrorResponse = { error: 'Admin access required' };
    response.status(403).json(body);
    return;
  }

  next();
};
