import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { RegistryError } from '../errors.js';
import {
  DEFAULT_REGISTRY_PATH,
  createRegistry,
  isRegisteredTable,
  isTranslatable,
  loadRegistry,
  registryToJSON
} from '../registry.js';

const { describe, it, beforeEach, afterEach } = test;

describe('createRegistry', () => {

  it('should fold table and column names to lower case', () => {
    const registry = createRegistry({ Menu_Node: ['Label'] });

    assert.ok(isRegisteredTable(registry, 'MENU_NODE'));
    assert.ok(isTranslatable(registry, { table: 'menu_node', columns: ['id', 'LABEL'] }, 2));
  });

  it('should merge tables that differ only in case', () => {
    const registry = createRegistry({ note_class: ['class'], NOTE_CLASS: ['label'] });

    assert.deepStrictEqual(registryToJSON(registry), { note_class: ['class', 'label'] });
  });
});

describe('isTranslatable', () => {
  const registry = createRegistry({ country: ['name'] });

  it('should look up the column at a 1-based ordinal', () => {
    const target = { table: 'country', columns: ['id', 'name'] };

    assert.strictEqual(isTranslatable(registry, target, 1), false);
    assert.strictEqual(isTranslatable(registry, target, 2), true);
  });

  it('should be false past the end of the column list', () => {
    assert.strictEqual(isTranslatable(registry, { table: 'country', columns: ['name'] }, 2), false);
  });
});

describe('loadRegistry', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sql-extract-registry-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load the bundled registry', async () => {
    const registry = await loadRegistry(DEFAULT_REGISTRY_PATH);

    assert.ok(isTranslatable(registry, { table: 'menu_node', columns: ['id', 'label'] }, 2));
    assert.ok(isTranslatable(registry, { table: 'country', columns: ['short_name', 'name'] }, 2));
  });

  it('should load a registry file', async () => {
    const registryPath = path.join(tempDir, 'registry.json');
    fs.writeFileSync(registryPath, JSON.stringify({ widget: ['caption', 'tooltip'] }));

    const registry = await loadRegistry(registryPath);

    assert.deepStrictEqual(registryToJSON(registry), { widget: ['caption', 'tooltip'] });
  });

  it('should reject a file that is not a table map', async () => {
    const registryPath = path.join(tempDir, 'registry.json');
    fs.writeFileSync(registryPath, JSON.stringify({ widget: 'caption' }));

    await assert.rejects(loadRegistry(registryPath), (err: unknown) =>
      err instanceof RegistryError &&
      err.message === `Registry ${registryPath}: columns of "widget" must be an array of strings`
    );
  });

  it('should reject a missing file', async () => {
    await assert.rejects(loadRegistry(path.join(tempDir, 'none.json')), RegistryError);
  });
});
