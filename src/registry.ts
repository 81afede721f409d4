import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Registry, TableTarget } from './types.js';
import { RegistryError, describeError } from './errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Bundled registry (go up from src/ or dist/ to the package root)
 */
export const DEFAULT_REGISTRY_PATH = path.resolve(__dirname, '..', 'data', 'translatable-columns.json');

/**
 * Build a registry from a plain table -> columns object.
 * Names are lower-cased: unquoted SQL identifiers are case-insensitive.
 */
export function createRegistry(tables: Record<string, readonly string[]>): Registry {
  const registry = new Map<string, ReadonlySet<string>>();

  for (const [table, columns] of Object.entries(tables)) {
    const key = table.toLowerCase();
    const existing = registry.get(key) ?? new Set<string>();
    registry.set(key, new Set([...existing, ...columns.map(c => c.toLowerCase())]));
  }

  return registry;
}

/**
 * Check the shape of a parsed registry file
 */
function validateRegistryJson(data: unknown, registryPath: string): Record<string, string[]> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new RegistryError(`Registry ${registryPath} must be a JSON object of table -> column list`, registryPath);
  }

  const tables: Record<string, string[]> = {};
  for (const [table, columns] of Object.entries(data)) {
    if (!Array.isArray(columns) || !columns.every((c): c is string => typeof c === 'string')) {
      throw new RegistryError(`Registry ${registryPath}: columns of "${table}" must be an array of strings`, registryPath);
    }
    tables[table] = columns;
  }
  return tables;
}

/**
 * Load a registry from a JSON file
 */
export async function loadRegistry(registryPath: string = DEFAULT_REGISTRY_PATH): Promise<Registry> {
  let data: unknown;
  try {
    data = await fs.readJson(registryPath);
  } catch (err) {
    throw new RegistryError(`Cannot read registry ${registryPath}: ${describeError(err)}`, registryPath);
  }
  return createRegistry(validateRegistryJson(data, registryPath));
}

export function isRegisteredTable(registry: Registry, table: string): boolean {
  return registry.has(table.toLowerCase());
}

/**
 * Whether the column at `ordinal` (1-based) of the target holds translatable text
 */
export function isTranslatable(registry: Registry, target: TableTarget, ordinal: number): boolean {
  const column = target.columns[ordinal - 1];
  if (column === undefined) return false;
  return registry.get(target.table)?.has(column.toLowerCase()) ?? false;
}

/**
 * Plain-object form, for JSON responses
 */
export function registryToJSON(registry: Registry): Record<string, string[]> {
  const result: Record<string, string[]> = {};
  for (const table of Array.from(registry.keys()).sort()) {
    result[table] = Array.from(registry.get(table) ?? []).sort();
  }
  return result;
}
