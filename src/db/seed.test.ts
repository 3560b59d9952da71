import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SEED_DATA_DIR } from "../testing/seededDatabase.js";
import {
  loadSeedData,
  type SeedData,
  SHOPS_FILE,
  seedDatabase,
  TREASURES_FILE,
} from "./seed.js";
import { createSqliteReader } from "./sqlite/createSqliteReader.js";
import { createSqliteWriter } from "./sqlite/createSqliteWriter.js";
import { closeDatabase, openDatabase } from "./sqlite/sqliteConnection.utils.js";

const tinyData: SeedData = {
  shops: [
    { shop_name: "First", slogan: "one" },
    { shop_name: "Second", slogan: "two" },
  ],
  treasures: [
    {
      treasure_name: "spoon",
      colour: "silver",
      age: 3,
      cost_at_auction: 4.5,
      shop_id: 2,
    },
  ],
};

describe(loadSeedData.name, () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "treasures-seed-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const write = (data: { shops: unknown; treasures: unknown }) => {
    writeFileSync(join(dir, SHOPS_FILE), JSON.stringify(data.shops));
    writeFileSync(join(dir, TREASURES_FILE), JSON.stringify(data.treasures));
  };

  it("loads the shipped fixtures", () => {
    const data = loadSeedData(SEED_DATA_DIR);

    expect(data.shops).toHaveLength(11);
    expect(data.treasures).toHaveLength(26);
  });

  it("loads a valid directory", () => {
    write(tinyData);

    expect(loadSeedData(dir)).toEqual(tinyData);
  });

  it("throws when a file is missing", () => {
    writeFileSync(join(dir, SHOPS_FILE), "[]");

    expect(() => loadSeedData(dir)).toThrow(
      `Seed file not found: ${join(dir, TREASURES_FILE)}`,
    );
  });

  it("throws on malformed JSON", () => {
    writeFileSync(join(dir, SHOPS_FILE), "[{");

    expect(() => loadSeedData(dir)).toThrow(
      `Failed to parse JSON seed file: ${join(dir, SHOPS_FILE)}`,
    );
  });

  it("throws on a negative age", () => {
    write({
      shops: tinyData.shops,
      treasures: [{ ...tinyData.treasures[0], age: -1 }],
    });

    expect(() => loadSeedData(dir)).toThrow();
  });

  it("throws when a treasure references a missing shop", () => {
    write({
      shops: tinyData.shops,
      treasures: [{ ...tinyData.treasures[0], shop_id: 3 }],
    });

    expect(() => loadSeedData(dir)).toThrow(
      'Seed treasure "spoon" references shop 3, but only 2 shops are defined',
    );
  });
});

describe(seedDatabase.name, () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase({ path: ":memory:" });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it("fills both tables with ids starting at 1", () => {
    seedDatabase(db, tinyData);

    const reader = createSqliteReader(db);
    expect(reader.listShops().map((s) => [s.id, s.name])).toEqual([
      [1, "First"],
      [2, "Second"],
    ]);
    expect(reader.getTreasure(1)).toEqual({
      id: 1,
      name: "spoon",
      colour: "silver",
      age: 3,
      costAtAuction: 4.5,
      shopId: 2,
    });
  });

  it("restarts generated ids after earlier inserts", async () => {
    seedDatabase(db, tinyData);
    await createSqliteWriter(db).addTreasure({
      name: "fork",
      colour: "silver",
      age: 1,
      costAtAuction: 2,
      shopId: 1,
    });

    seedDatabase(db, tinyData);
    const created = await createSqliteWriter(db).addTreasure({
      name: "knife",
      colour: "silver",
      age: 1,
      costAtAuction: 2,
      shopId: 1,
    });

    expect(created.id).toBe(2);
  });
});
