import { openDatabase } from '../src/db/client';
import { initializeDatabase } from '../src/db/schema';
import { createItemRepository } from '../src/repositories/itemRepository';
import { createSessionRepository } from '../src/repositories/sessionRepository';
import { createUserRepository } from '../src/repositories/userRepository';
import { createCredentialStore } from '../src/services/credentialStore';
import { createItemStore } from '../src/services/itemStore';
import { createSessionService } from '../src/services/sessionService';

export interface StoredItemRow {
  id: number;
  user_id: number;
  type: string;
  content: Buffer;
  created_at: string;
}

export const createTestContext = (options: { maxContentBytes?: number } = {}) => {
  const db = openDatabase(':memory:');
  initializeDatabase(db);

  const users = createUserRepository(db);
  const sessionRepository = createSessionRepository(db);
  const credentials = createCredentialStore(users);
  const items = createItemStore(createItemRepository(db), users, {
    maxContentBytes: options.maxContentBytes ?? 50 * 1024 * 1024,
  });
  const sessions = createSessionService(credentials, sessionRepository, users, { sessionDurationHours: 1 });

  const readItems = () =>
    db.prepare<[], StoredItemRow>('SELECT * FROM items ORDER BY id').all();

  return { db, users, sessionRepository, credentials, items, sessions, readItems };
};

export const declared = (entries: Record<string, string>) => new Map(Object.entries(entries));
