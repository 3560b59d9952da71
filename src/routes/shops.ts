import { Router } from "express";
import type { TreasureReader } from "../db/TreasureReader.js";
import { mergeStockValues } from "../query/stockValue.js";
import { toShopJson } from "./serializers.js";

/**
 * Routes mounted at /api/shops.
 */
export const createShopsRouter = (reader: TreasureReader): Router => {
  const router = Router();

  router.get("/", (_req, res) => {
    const shops = mergeStockValues(reader.listShops(), reader.sumStockByShop());
    res.json({ shops: shops.map(toShopJson) });
  });

  return router;
};
