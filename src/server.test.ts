import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { CONFIG_FILE_NAME } from "./config/configLoader.utils.js";
import { createSqliteReader } from "./db/sqlite/createSqliteReader.js";
import {
  closeDatabase,
  openDatabase,
} from "./db/sqlite/sqliteConnection.utils.js";
import { silentLogger } from "./logging/SilentApiLogger.js";
import { type ServerHandle, seedFromConfig, startHttpServer } from "./server.js";
import { SEED_DATA_DIR } from "./testing/seededDatabase.js";

describe(startHttpServer.name, () => {
  const TEST_DIR = mkdtempSync(join(tmpdir(), "treasures-server-"));
  let serverHandle: ServerHandle;

  beforeAll(async () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILE_NAME),
      JSON.stringify({
        server: { port: 0 },
        storage: { path: ":memory:" },
        seed: { dataDir: SEED_DATA_DIR },
      }),
    );

    serverHandle = await startHttpServer(["--seed"], {
      logger: silentLogger,
      projectRoot: TEST_DIR,
      env: {},
    });
  });

  afterAll(async () => {
    await serverHandle.close();
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("listens on a free port", () => {
    expect(serverHandle.port).toBeGreaterThan(0);
  });

  it("serves the seeded data", async () => {
    const response = await fetch(
      `http://127.0.0.1:${serverHandle.port}/api/treasures`,
    );
    const body = (await response.json()) as { treasures: unknown[] };

    expect(response.status).toBe(200);
    expect(body.treasures).toHaveLength(26);
  });
});

describe(seedFromConfig.name, () => {
  const TEST_DIR = mkdtempSync(join(tmpdir(), "treasures-seed-only-"));

  afterAll(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it("fails when the seed directory does not exist", () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILE_NAME),
      JSON.stringify({
        storage: { path: ":memory:" },
        seed: { dataDir: "./missing" },
      }),
    );

    expect(() =>
      seedFromConfig({ logger: silentLogger, projectRoot: TEST_DIR, env: {} }),
    ).toThrow(`Seed file not found: ${join(TEST_DIR, "missing", "shops.json")}`);
  });

  it("writes the database file under the project root", () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILE_NAME),
      JSON.stringify({
        storage: { path: "./db/treasures.db" },
        seed: { dataDir: SEED_DATA_DIR },
      }),
    );

    seedFromConfig({ logger: silentLogger, projectRoot: TEST_DIR, env: {} });

    const db = openDatabase({ path: join(TEST_DIR, "db", "treasures.db") });
    try {
      expect(createSqliteReader(db).listShops()).toHaveLength(11);
    } finally {
      closeDatabase(db);
    }
  });
});
