export const USER_ROLES = ['admin', 'user'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface UserRecord {
  id: string;
  username: string;
  passwordHash: string;
  role: UserRole;
}

export interface CreateUserInput {
  username: string;
  passwordHash: string;
  role: UserRole;
}

/** What the session keeps about the signed-in user. Never the hash. */
export interface SessionUser {
  id: string;
  username: string;
  role: UserRole;
}

export function isAdmin(user: Pick<SessionUser, 'role'>): boolean {
  return user.role === 'admin';
}

export function toSessionUser(record: UserRecord): SessionUser {
  return {
    id: record.id,
    username: record.username,
    role: record.role,
  };
}
