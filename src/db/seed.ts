import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { z } from "zod";
import { dropAllTables, initializeSchema } from "./sqlite/sqliteSchema.utils.js";

// --- Schemas ---

export const SeedShopSchema = z.object({
  shop_name: z.string().min(1),
  slogan: z.string(),
});

export const SeedTreasureSchema = z.object({
  treasure_name: z.string().min(1),
  colour: z.string().min(1),
  age: z.number().int().nonnegative(),
  cost_at_auction: z.number().nonnegative(),
  /** 1-based position of the shop in shops.json */
  shop_id: z.number().int().positive(),
});

export type SeedShop = z.infer<typeof SeedShopSchema>;
export type SeedTreasure = z.infer<typeof SeedTreasureSchema>;

export interface SeedData {
  shops: SeedShop[];
  treasures: SeedTreasure[];
}

export const SHOPS_FILE = "shops.json";
export const TREASURES_FILE = "treasures.json";

const readJsonArray = <S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): z.output<S>[] => {
  if (!existsSync(filePath)) {
    throw new Error(`Seed file not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch {
    throw new Error(`Failed to parse JSON seed file: ${filePath}`);
  }
  return z.array(schema).parse(raw);
};

/**
 * Read and validate shops.json and treasures.json from a directory.
 *
 * @throws Error if a file is missing, malformed, or a treasure points past the shop list
 */
export const loadSeedData = (dataDir: string): SeedData => {
  const shops = readJsonArray(join(dataDir, SHOPS_FILE), SeedShopSchema);
  const treasures = readJsonArray(
    join(dataDir, TREASURES_FILE),
    SeedTreasureSchema,
  );

  const orphan = treasures.find((t) => t.shop_id > shops.length);
  if (orphan) {
    throw new Error(
      `Seed treasure "${orphan.treasure_name}" references shop ${orphan.shop_id}, but only ${shops.length} shops are defined`,
    );
  }

  return { shops, treasures };
};

/**
 * Reset both tables to the given data in one transaction.
 * Tables are recreated so generated ids restart at 1.
 */
export const seedDatabase = (db: Database.Database, data: SeedData): void => {
  const reset = db.transaction(() => {
    dropAllTables(db);
    initializeSchema(db);

    const insertShop = db.prepare<[SeedShop]>(
      "INSERT INTO shops (shop_name, slogan) VALUES (@shop_name, @slogan)",
    );
    for (const shop of data.shops) {
      insertShop.run(shop);
    }

    const insertTreasure = db.prepare<[SeedTreasure]>(`
      INSERT INTO treasures (treasure_name, colour, age, cost_at_auction, shop_id)
      VALUES (@treasure_name, @colour, @age, @cost_at_auction, @shop_id)
    `);
    for (const treasure of data.treasures) {
      insertTreasure.run(treasure);
    }
  });

  reset();
};
