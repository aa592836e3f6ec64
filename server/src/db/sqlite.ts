/**
 * sqlite.ts
 *
 * Opens the better-sqlite3 database used for account persistence and makes
 * sure the schema exists. Accounts are stored as flat rows; the ordered
 * collection lives in `cards`, one row per owned copy.
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

export function openDatabase(file: string): SqliteDatabase {
    if (file !== ':memory:') {
        fs.mkdirSync(path.dirname(file), {recursive: true});
    }
    const db = new Database(file);
    if (file !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    db.exec(`
CREATE TABLE IF NOT EXISTS accounts (
  id INTEGER PRIMARY KEY,
  display_name TEXT,
  coins INTEGER NOT NULL CHECK (coins >= 0),
  gems INTEGER NOT NULL CHECK (gems >= 0),
  candies INTEGER NOT NULL CHECK (candies >= 0),
  stars INTEGER NOT NULL CHECK (stars >= 0),
  free_packs INTEGER NOT NULL,
  last_refill_at INTEGER NOT NULL,
  rating INTEGER NOT NULL,
  next_card_id INTEGER NOT NULL,
  dice_wins INTEGER NOT NULL DEFAULT 0,
  dice_losses INTEGER NOT NULL DEFAULT 0,
  dice_total INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS accounts_rating_idx ON accounts(rating DESC);
`);

    db.exec(`
CREATE TABLE IF NOT EXISTS cards (
  account_id INTEGER NOT NULL,
  id INTEGER NOT NULL,
  slot INTEGER NOT NULL,
  definition_id INTEGER NOT NULL,
  name TEXT NOT NULL,
  rarity TEXT NOT NULL,
  ovr INTEGER NOT NULL,
  role TEXT,
  acquired_at TEXT NOT NULL,
  media_ref TEXT,
  PRIMARY KEY (account_id, id),
  FOREIGN KEY (account_id) REFERENCES accounts(id) ON DELETE CASCADE
);
CREATE INDEX IF NOT EXISTS cards_account_slot_idx ON cards(account_id, slot);
`);

    return db;
}
