import bcrypt from 'bcrypt';
import type { DeclaredUsers } from '../config/env';
import type { UserRecord } from '../db/types';
import type { UserRepository } from '../repositories/userRepository';
import { planReconciliation } from './reconciliation';

const SALT_ROUNDS = 10;

const hashPassword = (plain: string) => bcrypt.hash(plain, SALT_ROUNDS);

// bcrypt's own comparison, never a recompute-and-compare.
const verifyPassword = (plain: string, hash: string) => bcrypt.compare(plain, hash);

export type VerifyResult =
  | { ok: true; user: UserRecord }
  | { ok: false; reason: 'user-not-found' | 'wrong-password' };

export interface ReconciliationSummary {
  created: number;
  updated: number;
  deleted: number;
}

export const createCredentialStore = (users: UserRepository) => {
  // Compared against when the username is unknown, so both failures cost one bcrypt round.
  let dummyHash: Promise<string> | undefined;
  const getDummyHash = () => {
    dummyHash ??= hashPassword('quicksave-unknown-user');
    return dummyHash;
  };

  const findByUsername = (username: string) => users.getUserByUsername(username);

  const verify = async (username: string, password: string): Promise<VerifyResult> => {
    const user = findByUsername(username);
    if (!user) {
      await verifyPassword(password, await getDummyHash());
      return { ok: false, reason: 'user-not-found' };
    }
    const isValid = await verifyPassword(password, user.passwordHash);
    return isValid ? { ok: true, user } : { ok: false, reason: 'wrong-password' };
  };

  const reconcile = async (declared: DeclaredUsers): Promise<ReconciliationSummary> => {
    const current = users.listUsers();

    const verified = new Set<string>();
    for (const user of current) {
      const password = declared.get(user.username);
      if (password !== undefined && (await verifyPassword(password, user.passwordHash))) {
        verified.add(user.username);
      }
    }

    const plan = planReconciliation(current, declared, verified);

    for (const { username, password } of plan.toCreate) {
      users.createUser(username, await hashPassword(password));
      console.log(`[users] created "${username}"`);
    }
    for (const { id, username, password } of plan.toUpdate) {
      users.updatePasswordHash(id, await hashPassword(password));
      console.log(`[users] updated password for "${username}"`);
    }
    for (const user of plan.toDelete) {
      users.deleteUser(user.id);
      console.log(`[users] deleted "${user.username}"`);
    }

    return {
      created: plan.toCreate.length,
      updated: plan.toUpdate.length,
      deleted: plan.toDelete.length,
    };
  };

  return {
    findByUsername,
    verify,
    reconcile,
  };
};

export type CredentialStore = ReturnType<typeof createCredentialStore>;
