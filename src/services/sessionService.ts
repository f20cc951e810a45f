import crypto from 'crypto';
import type { SessionRecord, UserRecord } from '../db/types';
import { AuthFailureError } from '../errors';
import type { SessionRepository } from '../repositories/sessionRepository';
import type { UserRepository } from '../repositories/userRepository';
import type { CredentialStore } from './credentialStore';

export type AuthUser = Pick<UserRecord, 'id' | 'username'>;

export interface LoginResult {
  token: string;
  expiresAt: string;
  user: AuthUser;
}

const toAuthUser = (user: UserRecord): AuthUser => ({
  id: user.id,
  username: user.username,
});

const generateSessionToken = () => crypto.randomBytes(48).toString('hex');

const isSessionExpired = (session: SessionRecord, now: number) => new Date(session.expiresAt).getTime() <= now;

export const createSessionService = (
  credentials: CredentialStore,
  sessions: SessionRepository,
  users: UserRepository,
  options: { sessionDurationHours: number }
) => {
  const sessionDurationMs = options.sessionDurationHours * 60 * 60 * 1000;

  const login = async (username: string, password: string): Promise<LoginResult> => {
    const result = await credentials.verify(username, password);
    if (!result.ok) {
      // Same error for unknown user and wrong password.
      console.warn(`[auth] failed login for "${username}"`);
      throw new AuthFailureError();
    }
    const expiresAt = new Date(Date.now() + sessionDurationMs);
    const session = sessions.createSession(result.user.id, generateSessionToken(), expiresAt);
    console.log(`[auth] "${username}" logged in`);
    return {
      token: session.token,
      expiresAt: session.expiresAt,
      user: toAuthUser(result.user),
    };
  };

  const logout = (token: string) => {
    sessions.deleteSessionByToken(token);
  };

  const authenticateToken = (token: string): { user: AuthUser; session: SessionRecord } | undefined => {
    sessions.purgeExpiredSessions();
    const session = sessions.getSessionByToken(token);
    if (!session || isSessionExpired(session, Date.now())) {
      return undefined;
    }
    const user = users.getUserById(session.userId);
    if (!user) {
      sessions.deleteSessionByToken(token);
      return undefined;
    }
    return { user: toAuthUser(user), session };
  };

  return { login, logout, authenticateToken };
};

export type SessionService = ReturnType<typeof createSessionService>;
