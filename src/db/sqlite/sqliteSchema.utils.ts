import type Database from "better-sqlite3";
import { setDbSchemaVersion } from "../versions.js";

/**
 * SQLite schema for treasures and shops.
 *
 * Tables:
 * - shops: read-only through the API
 * - treasures: each row belongs to one shop (foreign key)
 *
 * Foreign keys are only enforced when the connection enables them
 * (see openDatabase).
 */

const SHOPS_TABLE = `
CREATE TABLE IF NOT EXISTS shops (
  shop_id INTEGER PRIMARY KEY AUTOINCREMENT,
  shop_name TEXT NOT NULL,
  slogan TEXT NOT NULL
)`;

const TREASURES_TABLE = `
CREATE TABLE IF NOT EXISTS treasures (
  treasure_id INTEGER PRIMARY KEY AUTOINCREMENT,
  treasure_name TEXT NOT NULL,
  colour TEXT NOT NULL,
  age INTEGER NOT NULL CHECK (age >= 0),
  cost_at_auction REAL NOT NULL CHECK (cost_at_auction >= 0),
  shop_id INTEGER NOT NULL REFERENCES shops(shop_id)
)`;

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_treasures_shop_id ON treasures(shop_id)",
];

/**
 * Initialize the schema on a database connection.
 * Creates tables and indexes if they don't exist.
 */
export const initializeSchema = (db: Database.Database): void => {
  setDbSchemaVersion(db);

  db.exec(SHOPS_TABLE);
  db.exec(TREASURES_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

/**
 * Drop all tables. Treasures go first since they reference shops.
 */
export const dropAllTables = (db: Database.Database): void => {
  db.exec("DROP TABLE IF EXISTS treasures");
  db.exec("DROP TABLE IF EXISTS shops");
};
