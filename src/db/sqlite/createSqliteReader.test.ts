import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openSeededDatabase } from "../../testing/seededDatabase.js";
import type { TreasureQuery } from "../Types.js";
import {
  buildListTreasuresSql,
  createSqliteReader,
} from "./createSqliteReader.js";
import { closeDatabase } from "./sqliteConnection.utils.js";

const byAge: TreasureQuery = { sortBy: "age", order: "asc" };

describe(buildListTreasuresSql.name, () => {
  it("uses the fixed fragment for the sort column and direction", () => {
    const { sql, params } = buildListTreasuresSql({
      sortBy: "shop_name",
      order: "desc",
    });

    expect(sql).toContain("ORDER BY s.shop_name DESC, t.treasure_id ASC");
    expect(sql).not.toContain("WHERE");
    expect(params).toEqual({});
  });

  it("binds every filter as a parameter", () => {
    const { sql, params } = buildListTreasuresSql({
      ...byAge,
      colour: "silver",
      minAge: 10,
      maxAge: 90,
    });

    expect(sql).toContain(
      "WHERE t.colour = @colour AND t.age >= @minAge AND t.age <= @maxAge",
    );
    expect(params).toEqual({ colour: "silver", minAge: 10, maxAge: 90 });
  });

  it("keeps a zero bound", () => {
    const { sql, params } = buildListTreasuresSql({ ...byAge, minAge: 0 });

    expect(sql).toContain("WHERE t.age >= @minAge");
    expect(params).toEqual({ minAge: 0 });
  });
});

describe(createSqliteReader.name, () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openSeededDatabase();
  });

  afterEach(() => {
    closeDatabase(db);
  });

  describe("listTreasures", () => {
    it("returns every treasure with its shop name", () => {
      const reader = createSqliteReader(db);

      const result = reader.listTreasures(byAge);

      expect(result).toHaveLength(26);
      expect(result[0]).toEqual({
        id: 18,
        name: "gilt picture frame",
        colour: "gold",
        age: 2,
        costAtAuction: 9.95,
        shopName: "Ember Street Exchange",
      });
    });

    it("sorts descending", () => {
      const reader = createSqliteReader(db);

      const result = reader.listTreasures({ sortBy: "age", order: "desc" });

      expect(result[0]?.id).toBe(21);
      expect(result[25]?.id).toBe(18);
    });

    it("sorts by shop name", () => {
      const reader = createSqliteReader(db);

      const result = reader.listTreasures({
        sortBy: "shop_name",
        order: "asc",
      });

      // Barnacle & Brass holds 2, 3, 23; ties fall back to id order
      expect(result.slice(0, 3).map((t) => t.id)).toEqual([2, 3, 23]);
    });

    it("filters by colour", () => {
      const reader = createSqliteReader(db);

      const result = reader.listTreasures({ ...byAge, colour: "silver" });

      expect(result.map((t) => t.id)).toEqual([26, 10, 5, 2, 17]);
    });

    it("filters by inclusive age bounds", () => {
      const reader = createSqliteReader(db);

      const result = reader.listTreasures({
        ...byAge,
        minAge: 102,
        maxAge: 150,
      });

      expect(result.map((t) => t.age)).toEqual([102, 112, 120, 133, 150]);
    });

    it("returns an empty list when nothing matches", () => {
      const reader = createSqliteReader(db);

      expect(reader.listTreasures({ ...byAge, colour: "tartan" })).toEqual([]);
    });
  });

  describe("getTreasure", () => {
    it("returns the treasure with its shop id", () => {
      const reader = createSqliteReader(db);

      expect(reader.getTreasure(1)).toEqual({
        id: 1,
        name: "copper kettle",
        colour: "copper",
        age: 48,
        costAtAuction: 20,
        shopId: 1,
      });
    });

    it("returns null for an unknown id", () => {
      const reader = createSqliteReader(db);

      expect(reader.getTreasure(999)).toBeNull();
    });
  });

  describe("listShops", () => {
    it("returns all shops in id order", () => {
      const reader = createSqliteReader(db);

      const shops = reader.listShops();

      expect(shops).toHaveLength(11);
      expect(shops[0]).toEqual({
        id: 1,
        name: "The Gilded Attic",
        slogan: "Dust is just history settling",
      });
      expect(shops.map((s) => s.id)).toEqual([
        1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11,
      ]);
    });
  });

  describe("sumStockByShop", () => {
    it("omits shops without treasures", () => {
      const reader = createSqliteReader(db);

      const stocks = reader.sumStockByShop();

      expect(stocks.map((s) => s.shopId)).toEqual([
        1, 2, 3, 4, 5, 6, 7, 8, 9, 10,
      ]);
    });

    it("sums the auction costs of each shop", () => {
      const reader = createSqliteReader(db);

      const shop2 = reader.sumStockByShop().find((s) => s.shopId === 2);

      expect(shop2?.totalCost).toBeCloseTo(415.5, 10);
    });
  });
});
