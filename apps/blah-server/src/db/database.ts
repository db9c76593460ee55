import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import config from "../config.js";

let db: Database.Database | undefined;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDb() first.");
  }
  return db;
}

/** Open the database and run migrations. Pass ":memory:" for a throwaway store. */
export function initDb(dbPath = path.join(config.dataDir, "blah.sqlite")): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS rooms (
      id TEXT PRIMARY KEY,
      attrs INTEGER NOT NULL,
      title TEXT NOT NULL,
      creator TEXT NOT NULL,
      last_cid INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS room_members (
      room_id TEXT NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
      user TEXT NOT NULL,
      permission INTEGER NOT NULL,
      PRIMARY KEY (room_id, user)
    );

    CREATE TABLE IF NOT EXISTS chat_items (
      room_id TEXT NOT NULL REFERENCES rooms(id) ON DELETE CASCADE,
      cid INTEGER NOT NULL,
      user TEXT NOT NULL,
      text TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      nonce INTEGER NOT NULL,
      sig TEXT NOT NULL,
      PRIMARY KEY (room_id, cid)
    );

    CREATE TABLE IF NOT EXISTS used_nonces (
      user TEXT NOT NULL,
      nonce INTEGER NOT NULL,
      expires_at INTEGER NOT NULL,
      PRIMARY KEY (user, nonce)
    );

    CREATE INDEX IF NOT EXISTS idx_used_nonces_expiry
      ON used_nonces(expires_at);
  `);
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
