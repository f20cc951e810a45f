import { beforeEach, describe, expect, it, vi } from 'vitest';
import { isItemType } from '../src/db/types';
import { NotFoundError, ValidationError } from '../src/errors';
import { createTestContext } from './helpers';

describe('item store', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  const withUser = (options?: { maxContentBytes?: number }) => {
    const context = createTestContext(options);
    const user = context.users.createUser('alice', 'hash');
    return { ...context, user };
  };

  it('saves a note as a single row', () => {
    const { items, readItems, user } = withUser();
    expect(user.id).toBe(1);

    const id = items.save(1, 'note', Buffer.from('hello'));

    const rows = readItems();
    expect(rows).toHaveLength(1);
    expect(rows[0]?.id).toBe(id);
    expect(rows[0]?.user_id).toBe(1);
    expect(rows[0]?.type).toBe('note');
    expect(rows[0]?.content.equals(Buffer.from('hello'))).toBe(true);
    expect(rows[0]?.created_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('assigns increasing ids across saves', () => {
    const { items, user } = withUser();
    const first = items.save(user.id, 'note', Buffer.from('one'));
    const second = items.save(user.id, 'image', Buffer.from([0xff, 0xd8, 0xff]));
    const third = items.save(user.id, 'photo', Buffer.from([1, 2, 3]));
    expect(second).toBeGreaterThan(first);
    expect(third).toBeGreaterThan(second);
  });

  it('round-trips note text byte for byte', () => {
    const { items, readItems, user } = withUser();
    const text = 'héllo ✓ 日本語\nsecond line';
    items.save(user.id, 'note', new TextEncoder().encode(text));
    expect(readItems()[0]?.content.toString('utf8')).toBe(text);
  });

  it.each(['', '   ', '\n\t  \r\n'])('rejects a blank note %j', (content) => {
    const { items, readItems, user } = withUser();
    expect(() => items.save(user.id, 'note', Buffer.from(content))).toThrow(
      new ValidationError('Note content cannot be empty.')
    );
    expect(readItems()).toHaveLength(0);
  });

  it('accepts content at the ceiling and rejects anything larger', () => {
    const { items, readItems, user } = withUser({ maxContentBytes: 8 });
    items.save(user.id, 'document', Buffer.alloc(8, 1));
    expect(() => items.save(user.id, 'document', Buffer.alloc(9, 1))).toThrow(
      new ValidationError('File exceeds the 8 bytes size limit.')
    );
    expect(readItems()).toHaveLength(1);
  });

  it('rejects an unknown user', () => {
    const { items, readItems } = withUser();
    expect(() => items.save(42, 'note', Buffer.from('hello'))).toThrow(NotFoundError);
    expect(readItems()).toHaveLength(0);
  });

  it('recognises only the known item types', () => {
    expect(['note', 'image', 'document', 'photo'].every(isItemType)).toBe(true);
    expect(isItemType('video')).toBe(false);
    expect(isItemType(1)).toBe(false);
  });
});
