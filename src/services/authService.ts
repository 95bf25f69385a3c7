import type { SessionUser, UserRecord } from '../types/user';
import { toSessionUser } from '../types/user';

export interface AuthenticateDeps {
  findUserByUsername: (username: string) => Promise<UserRecord | null>;
  verifyPassword: (password: string, passwordHash: string) => Promise<boolean>;
}

export type AuthenticateResult =
  | { ok: true; user: SessionUser }
  | { ok: false; code: 'MISSING_CREDENTIALS' | 'INVALID_CREDENTIALS' };

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password';

function readCredential(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Checks a login form against stored users. Unknown usernames and wrong
 * passwords produce the same result so callers cannot tell them apart.
 */
export async function authenticateUser(
  payload: unknown,
  { findUserByUsername, verifyPassword }: AuthenticateDeps
): Promise<AuthenticateResult> {
  const body = typeof payload === 'object' && payload !== null ? payload : {};
  const username = readCredential('username' in body ? body.username : undefined).trim();
  const password = readCredential('password' in body ? body.password : undefined);

  if (!username || !password) {
    return { ok: false, code: 'MISSING_CREDENTIALS' };
  }

  const user = await findUserByUsername(username);
  if (!user) {
    return { ok: false, code: 'INVALID_CREDENTIALS' };
  }

  const matches = await verifyPassword(password, user.passwordHash);
  if (!matches) {
    return { ok: false, code: 'INVALID_CREDENTIALS' };
  }

  return { ok: true, user: toSessionUser(user) };
}
