/**
 * Domain types for treasures and shops.
 *
 * Storage rows use snake_case column names; these types are camelCase and
 * the HTTP layer serializes them back to the wire shape.
 */

/** Columns a treasure listing can be sorted by (wire names). */
export const SORT_FIELDS = [
  "treasure_id",
  "treasure_name",
  "colour",
  "age",
  "cost_at_auction",
  "shop_name",
] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export const SORT_ORDERS = ["asc", "desc"] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];

/**
 * A persisted treasure, as returned by the create endpoint.
 */
export interface Treasure {
  id: number;
  name: string;
  colour: string;
  age: number;
  costAtAuction: number;
  shopId: number;
}

/**
 * A treasure joined with its shop, as returned by the list endpoint.
 */
export interface TreasureListing {
  id: number;
  name: string;
  colour: string;
  age: number;
  costAtAuction: number;
  shopName: string;
}

export type NewTreasure = Omit<Treasure, "id">;

export interface Shop {
  id: number;
  name: string;
  slogan: string;
}

/**
 * Summed auction cost of one shop's treasures (unrounded).
 */
export interface ShopStock {
  shopId: number;
  totalCost: number;
}

export interface ShopWithStock extends Shop {
  stockValue: number;
}

/**
 * Validated listing request. Bounds are inclusive.
 */
export interface TreasureQuery {
  sortBy: SortField;
  order: SortOrder;
  colour?: string;
  minAge?: number;
  maxAge?: number;
}
