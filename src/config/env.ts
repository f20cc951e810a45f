import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const MIB = 1024 * 1024;
const MAX_DECLARED_USERS = 10;

// Use repo root as base so a relative DATABASE_PATH works no matter cwd.
const repoRoot = path.resolve(__dirname, '..', '..');
const resolvePath = (filepath: string | undefined, fallback: string) => {
  const target = filepath || fallback;
  if (target === ':memory:') return target;
  return path.isAbsolute(target) ? target : path.resolve(repoRoot, target);
};

const readPositiveInt = (env: NodeJS.ProcessEnv, key: string, fallback: number) => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid value for ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
};

export type DeclaredUsers = Map<string, string>;

/**
 * Reads `USER_1`..`USER_10`, each formatted `username:password`. The value is
 * split on the first colon, so passwords may contain colons.
 */
export const parseDeclaredUsers = (env: NodeJS.ProcessEnv): DeclaredUsers => {
  const declared: DeclaredUsers = new Map();
  for (let i = 1; i <= MAX_DECLARED_USERS; i += 1) {
    const key = `USER_${i}`;
    const value = env[key];
    if (!value) continue;

    const separator = value.indexOf(':');
    if (separator === -1) {
      console.warn(`[config] ${key} ignored: expected "username:password"`);
      continue;
    }
    const username = value.slice(0, separator);
    const password = value.slice(separator + 1);
    if (!username) {
      console.warn(`[config] ${key} ignored: empty username`);
      continue;
    }
    if (declared.has(username)) {
      console.warn(`[config] ${key} ignored: user "${username}" already declared`);
      continue;
    }
    declared.set(username, password);
  }
  return declared;
};

export interface AppConfig {
  port: number;
  databasePath: string;
  sessionDurationHours: number;
  jsonBodyLimit: string;
  maxUploadBytes: number;
  declaredUsers: DeclaredUsers;
}

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * MIB;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: readPositiveInt(env, 'PORT', 8888),
  databasePath: resolvePath(env.DATABASE_PATH, 'data/quicksave.db'),
  sessionDurationHours: readPositiveInt(env, 'SESSION_DURATION_HOURS', 24 * 7),
  jsonBodyLimit: env.JSON_BODY_LIMIT || '1mb',
  maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
  declaredUsers: parseDeclaredUsers(env),
});
