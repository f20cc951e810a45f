import type { Db } from '../db/client';
import type { SessionRecord } from '../db/types';

interface SessionRow {
  id: number;
  user_id: number;
  token: string;
  expires_at: string;
  created_at: string;
}

const toSession = (row: SessionRow): SessionRecord => ({
  id: row.id,
  userId: row.user_id,
  token: row.token,
  expiresAt: row.expires_at,
  createdAt: row.created_at,
});

export const createSessionRepository = (db: Db) => {
  const insertSessionStmt = db.prepare<[number, string, string]>(
    'INSERT INTO sessions (user_id, token, expires_at) VALUES (?, ?, ?)'
  );
  const selectSessionByTokenStmt = db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE token = ?');
  const deleteSessionStmt = db.prepare<[string]>('DELETE FROM sessions WHERE token = ?');
  const deleteExpiredSessionsStmt = db.prepare<[string]>('DELETE FROM sessions WHERE expires_at <= ?');

  return {
    createSession: (userId: number, token: string, expiresAt: Date): SessionRecord => {
      insertSessionStmt.run(userId, token, expiresAt.toISOString());
      const row = selectSessionByTokenStmt.get(token);
      if (!row) {
        throw new Error('Failed to create session');
      }
      return toSession(row);
    },

    getSessionByToken: (token: string): SessionRecord | undefined => {
      const row = selectSessionByTokenStmt.get(token);
      return row ? toSession(row) : undefined;
    },

    deleteSessionByToken: (token: string) => {
      deleteSessionStmt.run(token);
    },

    purgeExpiredSessions: (now = new Date()) => {
      deleteExpiredSessionsStmt.run(now.toISOString());
    },
  };
};

export type SessionRepository = ReturnType<typeof createSessionRepository>;
