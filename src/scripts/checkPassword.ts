import fs from 'fs';
import { loadConfig } from '../config/env';
import { openDatabase } from '../db/client';
import { initializeDatabase } from '../db/schema';
import { createUserRepository } from '../repositories/userRepository';
import { createCredentialStore } from '../services/credentialStore';

/** Resolves to the process exit code: 0 when the password matches, 1 otherwise, 2 on bad usage. */
export const checkPassword = async (databasePath: string, args: readonly string[]): Promise<number> => {
  const [username, password] = args;
  if (username === undefined || password === undefined) {
    console.error('Usage: check-password <username> <password>');
    return 2;
  }
  if (databasePath !== ':memory:' && !fs.existsSync(databasePath)) {
    console.error(`Error: Database file not found at ${databasePath}`);
    return 1;
  }

  const db = openDatabase(databasePath);
  try {
    initializeDatabase(db);
    const result = await createCredentialStore(createUserRepository(db)).verify(username, password);
    if (result.ok) {
      console.log(`Password for user '${username}' is correct.`);
      return 0;
    }
    if (result.reason === 'wrong-password') {
      console.log(`Password for user '${username}' is incorrect.`);
      return 1;
    }
    console.log(`User '${username}' not found in the database.`);
    return 1;
  } finally {
    db.close();
  }
};

if (require.main === module) {
  checkPassword(loadConfig().databasePath, process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
