import type { Db } from '../db/client';
import type { UserRecord } from '../db/types';
import { withIntegrity } from '../errors';

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
}

const toUser = (row: UserRow): UserRecord => ({
  id: row.id,
  username: row.username,
  passwordHash: row.password_hash,
});

export const createUserRepository = (db: Db) => {
  const insertUserStmt = db.prepare<[string, string]>('INSERT INTO users (username, password_hash) VALUES (?, ?)');
  const selectUserByIdStmt = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?');
  const selectUserByUsernameStmt = db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?');
  const selectAllUsersStmt = db.prepare<[], UserRow>('SELECT * FROM users ORDER BY id');
  const updatePasswordStmt = db.prepare<[string, number]>('UPDATE users SET password_hash = ? WHERE id = ?');
  const deleteUserStmt = db.prepare<[number]>('DELETE FROM users WHERE id = ?');
  const deleteUserSessionsStmt = db.prepare<[number]>('DELETE FROM sessions WHERE user_id = ?');

  const removeUser = db.transaction((id: number) => {
    deleteUserSessionsStmt.run(id);
    return deleteUserStmt.run(id).changes > 0;
  });

  return {
    createUser: (username: string, passwordHash: string): UserRecord => {
      const result = withIntegrity(`User "${username}" already exists`, () =>
        insertUserStmt.run(username, passwordHash)
      );
      const row = selectUserByIdStmt.get(Number(result.lastInsertRowid));
      if (!row) {
        throw new Error('Failed to create user');
      }
      return toUser(row);
    },

    getUserByUsername: (username: string): UserRecord | undefined => {
      const row = selectUserByUsernameStmt.get(username);
      return row ? toUser(row) : undefined;
    },

    getUserById: (id: number): UserRecord | undefined => {
      const row = selectUserByIdStmt.get(id);
      return row ? toUser(row) : undefined;
    },

    listUsers: (): UserRecord[] => selectAllUsersStmt.all().map(toUser),

    updatePasswordHash: (id: number, passwordHash: string) => updatePasswordStmt.run(passwordHash, id).changes > 0,

    // Items are left in place; only the user's sessions go with it.
    deleteUser: (id: number): boolean => removeUser(id),
  };
};

export type UserRepository = ReturnType<typeof createUserRepository>;
