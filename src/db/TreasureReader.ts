import type {
  Shop,
  ShopStock,
  Treasure,
  TreasureListing,
  TreasureQuery,
} from "./Types.js";

/**
 * Read treasures and shops.
 * Used by: HTTP routes
 */
export interface TreasureReader {
  /**
   * List treasures joined with their shop name, sorted and filtered.
   * Ties on the sort column are broken by treasure id (ascending).
   */
  listTreasures(query: TreasureQuery): TreasureListing[];

  /**
   * Get one treasure by id.
   *
   * @returns The treasure, or null if no row matches
   */
  getTreasure(id: number): Treasure | null;

  /**
   * List all shops ordered by id.
   */
  listShops(): Shop[];

  /**
   * Sum of auction costs per shop. Shops without treasures are absent.
   */
  sumStockByShop(): ShopStock[];
}
