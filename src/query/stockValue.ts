import type { Shop, ShopStock, ShopWithStock } from "../db/Types.js";

/**
 * Round to 2 decimal places.
 */
export const roundToCents = (value: number): number =>
  Number(value.toFixed(2));

/**
 * Attach each shop's rounded stock value. Shops without treasures get 0.
 */
export const mergeStockValues = (
  shops: Shop[],
  stocks: ShopStock[],
): ShopWithStock[] => {
  const totals = new Map(stocks.map((s) => [s.shopId, s.totalCost]));
  return shops.map((shop) => ({
    ...shop,
    stockValue: roundToCents(totals.get(shop.id) ?? 0),
  }));
};
