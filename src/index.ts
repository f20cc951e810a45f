import { createApp } from './app';
import { loadConfig } from './config/env';
import { openDatabase } from './db/client';
import { initializeDatabase } from './db/schema';
import { createItemRepository } from './repositories/itemRepository';
import { createSessionRepository } from './repositories/sessionRepository';
import { createUserRepository } from './repositories/userRepository';
import { createCredentialStore } from './services/credentialStore';
import { createItemStore } from './services/itemStore';
import { createSessionService } from './services/sessionService';

export const start = async () => {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  initializeDatabase(db);
  console.log(`[db] using ${config.databasePath}`);

  const users = createUserRepository(db);
  const credentials = createCredentialStore(users);
  const items = createItemStore(createItemRepository(db), users, { maxContentBytes: config.maxUploadBytes });
  const sessions = createSessionService(credentials, createSessionRepository(db), users, {
    sessionDurationHours: config.sessionDurationHours,
  });

  // No request is served against a partially reconciled user set.
  const summary = await credentials.reconcile(config.declaredUsers);
  console.log(
    `[users] reconciled: ${summary.created} created, ${summary.updated} updated, ${summary.deleted} deleted`
  );

  const app = createApp({ config, items, sessions });
  const server = app.listen(config.port, () => {
    console.log(`QuickSave running on port ${config.port}`);
  });
  server.on('close', () => db.close());
  return server;
};

if (require.main === module) {
  start().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
