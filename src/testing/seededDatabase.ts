import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import { loadSeedData, seedDatabase } from "../db/seed.js";
import { openDatabase } from "../db/sqlite/sqliteConnection.utils.js";

/** The shipped fixture directory (11 shops, 26 treasures). */
export const SEED_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

/**
 * Open an in-memory database reset to the shipped fixtures.
 */
export const openSeededDatabase = (): Database.Database => {
  const db = openDatabase({ path: ":memory:" });
  seedDatabase(db, loadSeedData(SEED_DATA_DIR));
  return db;
};
