import type { NewTreasure, Treasure } from "./Types.js";

/**
 * Create, update and delete treasures.
 * Shops are read-only.
 */
export interface TreasureWriter {
  /**
   * Insert a treasure.
   *
   * @returns The persisted treasure with its generated id
   * @throws SqliteError (SQLITE_CONSTRAINT_FOREIGNKEY) if the shop does not exist
   */
  addTreasure(treasure: NewTreasure): Promise<Treasure>;

  /**
   * Set the auction cost of a treasure.
   *
   * @returns false if no treasure has this id
   */
  updatePrice(id: number, costAtAuction: number): Promise<boolean>;

  /**
   * Delete a treasure.
   *
   * @returns false if no treasure has this id
   */
  deleteTreasure(id: number): Promise<boolean>;
}
