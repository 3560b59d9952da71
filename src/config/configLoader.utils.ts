import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type ProjectConfig, ProjectConfigSchema } from "./Config.schemas.js";

/**
 * Supported config file name.
 */
export const CONFIG_FILE_NAME = "treasures.config.json" as const;

/**
 * Find a config file in the given directory.
 *
 * @param directory - Directory to search in
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 * Pure function - unit tested.
 *
 * @param content - Raw JSON string from config file
 * @returns Validated project config, defaults filled in
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): ProjectConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return ProjectConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Thin I/O wrapper around parseConfig.
 */
export const loadConfig = (configPath: string): ProjectConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(content);
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }
};

/**
 * Apply environment overrides on top of a loaded config.
 * Only `PORT` is honoured, and only when it is a positive integer.
 */
export const applyEnvOverrides = (
  config: ProjectConfig,
  env: NodeJS.ProcessEnv,
): ProjectConfig => {
  // biome-ignore lint/complexity/useLiteralKeys: index signature
  const rawPort = env["PORT"];
  if (rawPort === undefined || !/^\d+$/.test(rawPort)) {
    return config;
  }
  const port = Number(rawPort);
  if (port <= 0) {
    return config;
  }
  return { ...config, server: { ...config.server, port } };
};

/**
 * Result type for loadConfigOrDefault indicating how config was obtained.
 */
export type ConfigResult = {
  config: ProjectConfig;
  source: "explicit" | "default";
  configPath?: string;
};

/**
 * Load config from the explicit file, or fall back to defaults.
 *
 * @param directory - Directory to search for config
 * @param env - Environment used for overrides (default: process.env)
 */
export const loadConfigOrDefault = (
  directory: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult => {
  const configPath = findConfigFile(directory);
  if (configPath) {
    const config = applyEnvOverrides(loadConfig(configPath), env);
    return { config, source: "explicit", configPath };
  }

  return {
    config: applyEnvOverrides(ProjectConfigSchema.parse({}), env),
    source: "default",
  };
};
