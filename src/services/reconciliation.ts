import type { DeclaredUsers } from '../config/env';
import type { UserRecord } from '../db/types';

export interface DeclaredCredential {
  username: string;
  password: string;
}

export interface ReconciliationPlan {
  toCreate: DeclaredCredential[];
  toUpdate: Array<DeclaredCredential & { id: number }>;
  toDelete: UserRecord[];
}

/**
 * Three-way diff keyed by username. `verified` holds the usernames whose
 * stored hash already matches the declared password; every other user present
 * on both sides needs a fresh hash.
 */
export const planReconciliation = (
  current: readonly UserRecord[],
  declared: DeclaredUsers,
  verified: ReadonlySet<string>
): ReconciliationPlan => {
  const existing = new Map(current.map((user) => [user.username, user]));
  const plan: ReconciliationPlan = { toCreate: [], toUpdate: [], toDelete: [] };

  declared.forEach((password, username) => {
    const user = existing.get(username);
    if (!user) {
      plan.toCreate.push({ username, password });
    } else if (!verified.has(username)) {
      plan.toUpdate.push({ id: user.id, username, password });
    }
  });

  plan.toDelete = current.filter((user) => !declared.has(user.username));
  return plan;
};
