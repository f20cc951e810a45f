import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

export type Db = Database.Database;

export const openDatabase = (databasePath: string): Db => {
  if (databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const db = new Database(databasePath);
  db.pragma('journal_mode = WAL');
  // Left off: removing a user keeps that user's items as orphaned rows.
  db.pragma('foreign_keys = OFF');
  return db;
};
