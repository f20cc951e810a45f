import { beforeEach, describe, expect, it, vi } from 'vitest';
import { IntegrityError } from '../src/errors';
import { createTestContext, declared } from './helpers';

describe('credential store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('creates, updates and removes users as the declared list changes', async () => {
    const { credentials, users } = createTestContext();

    expect(await credentials.reconcile(declared({ alice: 'pw1' }))).toEqual({ created: 1, updated: 0, deleted: 0 });
    const created = credentials.findByUsername('alice');
    expect(created?.username).toBe('alice');
    expect((await credentials.verify('alice', 'pw1')).ok).toBe(true);
    expect(await credentials.verify('alice', 'wrong')).toEqual({ ok: false, reason: 'wrong-password' });

    expect(await credentials.reconcile(declared({ alice: 'pw2' }))).toEqual({ created: 0, updated: 1, deleted: 0 });
    expect(credentials.findByUsername('alice')?.id).toBe(created?.id);
    expect((await credentials.verify('alice', 'pw2')).ok).toBe(true);
    expect(await credentials.verify('alice', 'pw1')).toEqual({ ok: false, reason: 'wrong-password' });

    expect(await credentials.reconcile(declared({}))).toEqual({ created: 0, updated: 0, deleted: 1 });
    expect(users.listUsers()).toEqual([]);
  });

  it('leaves exactly the declared users, each verifying its password', async () => {
    const { credentials, users } = createTestContext();
    users.createUser('stale', 'not-a-real-hash');
    users.createUser('bob', 'not-a-real-hash');

    await credentials.reconcile(declared({ alice: 'a-pass', bob: 'b-pass', carol: 'c:pass' }));

    expect(users.listUsers().map((user) => user.username).sort()).toEqual(['alice', 'bob', 'carol']);
    expect((await credentials.verify('alice', 'a-pass')).ok).toBe(true);
    expect((await credentials.verify('bob', 'b-pass')).ok).toBe(true);
    expect((await credentials.verify('carol', 'c:pass')).ok).toBe(true);
  });

  it('performs no mutations when reconciled twice with the same list', async () => {
    const { credentials, users } = createTestContext();
    const list = declared({ alice: 'pw1', bob: 'pw2' });
    await credentials.reconcile(list);
    const before = users.listUsers();

    const createUser = vi.spyOn(users, 'createUser');
    const updatePasswordHash = vi.spyOn(users, 'updatePasswordHash');
    const deleteUser = vi.spyOn(users, 'deleteUser');

    expect(await credentials.reconcile(list)).toEqual({ created: 0, updated: 0, deleted: 0 });
    expect(createUser).not.toHaveBeenCalled();
    expect(updatePasswordHash).not.toHaveBeenCalled();
    expect(deleteUser).not.toHaveBeenCalled();
    expect(users.listUsers()).toEqual(before);
  });

  it('stores a bcrypt hash rather than the password', async () => {
    const { credentials } = createTestContext();
    await credentials.reconcile(declared({ alice: 'pw1' }));
    const hash = credentials.findByUsername('alice')?.passwordHash ?? '';
    expect(hash).not.toContain('pw1');
    expect(hash.startsWith('$2b$10$')).toBe(true);
  });

  it('reports an unknown user without revealing anything else', async () => {
    const { credentials } = createTestContext();
    await credentials.reconcile(declared({ alice: 'pw1' }));
    expect(await credentials.verify('mallory', 'pw1')).toEqual({ ok: false, reason: 'user-not-found' });
    expect(await credentials.verify('ALICE', 'pw1')).toEqual({ ok: false, reason: 'user-not-found' });
  });

  it('looks up usernames without case folding', () => {
    const { credentials, users } = createTestContext();
    users.createUser('Alice', 'hash');
    expect(credentials.findByUsername('alice')).toBeUndefined();
    expect(credentials.findByUsername('Alice')?.username).toBe('Alice');
  });

  it('rejects a duplicate username with an integrity error', () => {
    const { users } = createTestContext();
    users.createUser('alice', 'hash');
    expect(() => users.createUser('alice', 'other')).toThrow(IntegrityError);
  });

  it('keeps items of a removed user as orphaned rows', async () => {
    const { credentials, items, readItems } = createTestContext();
    await credentials.reconcile(declared({ alice: 'pw1' }));
    const alice = credentials.findByUsername('alice');
    if (!alice) throw new Error('alice was not created');
    items.save(alice.id, 'note', Buffer.from('keep me'));

    await credentials.reconcile(declared({}));

    const rows = readItems();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.user_id).toBe(alice.id);
    expect(rows[0]?.content.toString('utf8')).toBe('keep me');
  });
});
