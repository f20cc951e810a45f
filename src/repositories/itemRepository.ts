import type { Db } from '../db/client';
import type { ItemType } from '../db/types';
import { withIntegrity } from '../errors';

export const createItemRepository = (db: Db) => {
  const insertItemStmt = db.prepare<[number, string, Buffer]>(
    'INSERT INTO items (user_id, type, content) VALUES (?, ?, ?)'
  );

  return {
    insertItem: (userId: number, type: ItemType, content: Buffer): number => {
      const result = withIntegrity('Item violates a storage constraint', () =>
        insertItemStmt.run(userId, type, content)
      );
      return Number(result.lastInsertRowid);
    },
  };
};

export type ItemRepository = ReturnType<typeof createItemRepository>;
