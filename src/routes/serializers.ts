import type { ShopWithStock, Treasure, TreasureListing } from "../db/Types.js";

/**
 * Wire shapes. Field names match the storage columns.
 */
export interface TreasureListingJson {
  treasure_id: number;
  treasure_name: string;
  colour: string;
  age: number;
  cost_at_auction: number;
  shop_name: string;
}

export interface TreasureJson {
  treasure_id: number;
  treasure_name: string;
  colour: string;
  age: number;
  cost_at_auction: number;
  shop_id: number;
}

export interface ShopJson {
  shop_id: number;
  shop_name: string;
  slogan: string;
  "stock value": number;
}

export const toTreasureListingJson = (
  treasure: TreasureListing,
): TreasureListingJson => ({
  treasure_id: treasure.id,
  treasure_name: treasure.name,
  colour: treasure.colour,
  age: treasure.age,
  cost_at_auction: treasure.costAtAuction,
  shop_name: treasure.shopName,
});

export const toTreasureJson = (treasure: Treasure): TreasureJson => ({
  treasure_id: treasure.id,
  treasure_name: treasure.name,
  colour: treasure.colour,
  age: treasure.age,
  cost_at_auction: treasure.costAtAuction,
  shop_id: treasure.shopId,
});

export const toShopJson = (shop: ShopWithStock): ShopJson => ({
  shop_id: shop.id,
  shop_name: shop.name,
  slogan: shop.slogan,
  "stock value": shop.stockValue,
});
