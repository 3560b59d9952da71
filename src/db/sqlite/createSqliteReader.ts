import type Database from "better-sqlite3";
import type { TreasureReader } from "../TreasureReader.js";
import type {
  Shop,
  ShopStock,
  SortField,
  SortOrder,
  Treasure,
  TreasureListing,
  TreasureQuery,
} from "../Types.js";

/**
 * SQL fragment for each sortable field. The only path from a request
 * parameter into ORDER BY.
 */
const SORT_COLUMNS: Record<SortField, string> = {
  treasure_id: "t.treasure_id",
  treasure_name: "t.treasure_name",
  colour: "t.colour",
  age: "t.age",
  cost_at_auction: "t.cost_at_auction",
  shop_name: "s.shop_name",
};

const ORDER_KEYWORDS: Record<SortOrder, string> = {
  asc: "ASC",
  desc: "DESC",
};

/**
 * Raw treasure row from SQLite.
 */
interface TreasureRow {
  treasure_id: number;
  treasure_name: string;
  colour: string;
  age: number;
  cost_at_auction: number;
  shop_id: number;
}

/**
 * Raw row from the treasures/shops join.
 */
interface TreasureListingRow {
  treasure_id: number;
  treasure_name: string;
  colour: string;
  age: number;
  cost_at_auction: number;
  shop_name: string;
}

interface ShopRow {
  shop_id: number;
  shop_name: string;
  slogan: string;
}

interface ShopStockRow {
  shop_id: number;
  total_cost: number;
}

export type ListTreasuresParams = Record<string, string | number>;

export const rowToTreasure = (row: TreasureRow): Treasure => ({
  id: row.treasure_id,
  name: row.treasure_name,
  colour: row.colour,
  age: row.age,
  costAtAuction: row.cost_at_auction,
  shopId: row.shop_id,
});

const rowToListing = (row: TreasureListingRow): TreasureListing => ({
  id: row.treasure_id,
  name: row.treasure_name,
  colour: row.colour,
  age: row.age,
  costAtAuction: row.cost_at_auction,
  shopName: row.shop_name,
});

const rowToShop = (row: ShopRow): Shop => ({
  id: row.shop_id,
  name: row.shop_name,
  slogan: row.slogan,
});

/**
 * Build the listing statement for a validated query.
 * Filters become bound parameters; sort column and direction come from
 * the fixed fragments above.
 */
export const buildListTreasuresSql = (
  query: TreasureQuery,
): { sql: string; params: ListTreasuresParams } => {
  const conditions: string[] = [];
  const params: ListTreasuresParams = {};

  if (query.colour !== undefined) {
    conditions.push("t.colour = @colour");
    params.colour = query.colour;
  }
  if (query.minAge !== undefined) {
    conditions.push("t.age >= @minAge");
    params.minAge = query.minAge;
  }
  if (query.maxAge !== undefined) {
    conditions.push("t.age <= @maxAge");
    params.maxAge = query.maxAge;
  }

  const where =
    conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

  const sql = `SELECT t.treasure_id, t.treasure_name, t.colour, t.age, t.cost_at_auction, s.shop_name
FROM treasures t
JOIN shops s ON t.shop_id = s.shop_id
${where}
ORDER BY ${SORT_COLUMNS[query.sortBy]} ${ORDER_KEYWORDS[query.order]}, t.treasure_id ASC`;

  return { sql, params };
};

/**
 * Create a TreasureReader backed by SQLite.
 *
 * @param db - better-sqlite3 database instance
 */
export const createSqliteReader = (db: Database.Database): TreasureReader => {
  const getTreasureStmt = db.prepare<[number], TreasureRow>(
    "SELECT treasure_id, treasure_name, colour, age, cost_at_auction, shop_id FROM treasures WHERE treasure_id = ?",
  );

  const listShopsStmt = db.prepare<[], ShopRow>(
    "SELECT shop_id, shop_name, slogan FROM shops ORDER BY shop_id",
  );

  const sumStockStmt = db.prepare<[], ShopStockRow>(`
    SELECT shop_id, SUM(cost_at_auction) AS total_cost
    FROM treasures
    GROUP BY shop_id
    ORDER BY shop_id
  `);

  return {
    listTreasures(query: TreasureQuery): TreasureListing[] {
      // SQL text varies with the filters present, so prepare per call
      const { sql, params } = buildListTreasuresSql(query);
      return db
        .prepare<[ListTreasuresParams], TreasureListingRow>(sql)
        .all(params)
        .map(rowToListing);
    },

    getTreasure(id: number): Treasure | null {
      const row = getTreasureStmt.get(id);
      return row ? rowToTreasure(row) : null;
    },

    listShops(): Shop[] {
      return listShopsStmt.all().map(rowToShop);
    },

    sumStockByShop(): ShopStock[] {
      return sumStockStmt.all().map((row) => ({
        shopId: row.shop_id,
        totalCost: row.total_cost,
      }));
    },
  };
};
