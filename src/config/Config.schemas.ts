import { z } from "zod";

// --- Defaults ---

export const DEFAULT_PORT = 9090;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_STORAGE_PATH = ".treasures/treasures.db";
export const DEFAULT_SEED_DIR = "./data";

// --- Schemas ---

export const ServerConfigSchema = z.object({
  /** HTTP server port (default: 9090). 0 picks a free port. */
  port: z.number().int().nonnegative().default(DEFAULT_PORT),
  /** Bind address (default: '127.0.0.1') */
  host: z.string().min(1).default(DEFAULT_HOST),
});

export const StorageConfigSchema = z.object({
  /** SQLite database file, relative to the project root. ':memory:' is accepted. */
  path: z.string().min(1).default(DEFAULT_STORAGE_PATH),
});

export const SeedConfigSchema = z.object({
  /** Directory holding shops.json and treasures.json */
  dataDir: z.string().min(1).default(DEFAULT_SEED_DIR),
});

/** Project configuration schema */
export const ProjectConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  seed: SeedConfigSchema.default({}),
});

// --- Inferred Types ---

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
