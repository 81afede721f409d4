/**
 * Configuration module.
 *
 * Loads config from config/config.{SQL_EXTRACT_CONFIG}.json
 * Provides typed access to configuration values.
 */

import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// package root, from src/ or dist/
const codeRoot = path.resolve(__dirname, "..");

export interface ExtractConfig {
  registryPath?: string;
  port?: number;
  maxBodySize?: string;
}

let cachedConfig: ExtractConfig | null = null;

export function getConfigDir(): string {
  return process.env.SQL_EXTRACT_CONFIG_DIR ?? path.join(codeRoot, "config");
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(): Promise<ExtractConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.SQL_EXTRACT_CONFIG ?? "default";
  const configFileName = `config.${configEnv}.json`;
  const configDir = getConfigDir();

  try {
    const loaded: unknown = await fs.readJson(path.join(configDir, configFileName));
    cachedConfig = parseConfig(loaded, configDir);
  } catch {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    cachedConfig = {};
  }

  return cachedConfig;
}

/**
 * Keep the known keys of a parsed config file; relative paths resolve against its directory.
 */
export function parseConfig(data: unknown, configDir: string): ExtractConfig {
  const config: ExtractConfig = {};
  if (typeof data !== "object" || data === null) {
    return config;
  }

  const fields = new Map<string, unknown>(Object.entries(data));
  const registryPath = fields.get("registryPath");
  const port = fields.get("port");
  const maxBodySize = fields.get("maxBodySize");
  if (typeof registryPath === "string") {
    config.registryPath = path.resolve(configDir, registryPath);
  }
  if (typeof port === "number") {
    config.port = port;
  }
  if (typeof maxBodySize === "string") {
    config.maxBodySize = maxBodySize;
  }
  return config;
}

/**
 * Get configuration synchronously (must call loadConfig first during bootstrap).
 */
export function getConfig(): ExtractConfig {
  return cachedConfig ?? {};
}

/**
 * Get server port from config.
 */
export function getServerPort(): number {
  const config = getConfig();
  return Number(process.env.PORT ?? config.port ?? 3000);
}

export function getMaxBodySize(): string {
  return getConfig().maxBodySize ?? "5mb";
}
