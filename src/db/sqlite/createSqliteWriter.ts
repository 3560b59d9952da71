import type Database from "better-sqlite3";
import type { TreasureWriter } from "../TreasureWriter.js";
import type { NewTreasure, Treasure } from "../Types.js";
import { rowToTreasure } from "./createSqliteReader.js";

interface InsertedTreasureRow {
  treasure_id: number;
  treasure_name: string;
  colour: string;
  age: number;
  cost_at_auction: number;
  shop_id: number;
}

interface InsertTreasureParams {
  name: string;
  colour: string;
  age: number;
  costAtAuction: number;
  shopId: number;
}

/**
 * Create a TreasureWriter backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 */
export const createSqliteWriter = (db: Database.Database): TreasureWriter => {
  const insertTreasureStmt = db.prepare<
    [InsertTreasureParams],
    InsertedTreasureRow
  >(`
    INSERT INTO treasures (treasure_name, colour, age, cost_at_auction, shop_id)
    VALUES (@name, @colour, @age, @costAtAuction, @shopId)
    RETURNING treasure_id, treasure_name, colour, age, cost_at_auction, shop_id
  `);

  const updatePriceStmt = db.prepare<[{ id: number; price: number }]>(
    "UPDATE treasures SET cost_at_auction = @price WHERE treasure_id = @id",
  );

  const deleteTreasureStmt = db.prepare<[number]>(
    "DELETE FROM treasures WHERE treasure_id = ?",
  );

  return {
    async addTreasure(treasure: NewTreasure): Promise<Treasure> {
      const row = insertTreasureStmt.get({
        name: treasure.name,
        colour: treasure.colour,
        age: treasure.age,
        costAtAuction: treasure.costAtAuction,
        shopId: treasure.shopId,
      });
      if (!row) {
        throw new Error("INSERT ... RETURNING produced no row");
      }
      return rowToTreasure(row);
    },

    async updatePrice(id: number, costAtAuction: number): Promise<boolean> {
      return updatePriceStmt.run({ id, price: costAtAuction }).changes > 0;
    },

    async deleteTreasure(id: number): Promise<boolean> {
      return deleteTreasureStmt.run(id).changes > 0;
    },
  };
};
