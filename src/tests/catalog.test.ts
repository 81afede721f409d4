import * as test from 'node:test';
import * as assert from 'node:assert';
import { Catalog, escapeCatalogString } from '../catalog.js';

const { describe, it } = test;

describe('Catalog', () => {

  it('should group every location under one entry', () => {
    const catalog = new Catalog();
    catalog.record('Yes', { source: 'a.sql', line: 3 });
    catalog.record('No', { source: 'a.sql', line: 4 });
    catalog.record('Yes', { source: 'b.sql', line: 1 });
    catalog.record('Yes', { source: 'b.sql', line: 1 });

    assert.strictEqual(catalog.size, 2);
    assert.deepStrictEqual(catalog.locations('Yes'), [
      { source: 'a.sql', line: 3 },
      { source: 'b.sql', line: 1 },
      { source: 'b.sql', line: 1 }
    ]);
  });

  it('should serialize one block per string', () => {
    const catalog = new Catalog();
    catalog.record('Yes', { source: 'a.sql', line: 3 });
    catalog.record('No', { source: 'a.sql', line: 4 });
    catalog.record('Yes', { source: 'b.sql', line: 1 });

    assert.strictEqual(catalog.serialize(), `#: a.sql:3
#: b.sql:1
msgid "Yes"
msgstr ""

#: a.sql:4
msgid "No"
msgstr ""

`);
  });

  it('should serialize an empty catalog as empty text', () => {
    assert.strictEqual(new Catalog().serialize(), '');
  });

  it('should not expose its location lists', () => {
    const catalog = new Catalog();
    catalog.record('Yes', { source: 'a.sql', line: 3 });

    catalog.locations('Yes').push({ source: 'x.sql', line: 9 });
    catalog.entries()[0].locations.length = 0;

    assert.deepStrictEqual(catalog.locations('Yes'), [{ source: 'a.sql', line: 3 }]);
  });

  it('should return no locations for an unknown string', () => {
    assert.deepStrictEqual(new Catalog().locations('missing'), []);
  });
});

describe('escapeCatalogString', () => {

  it('should escape backslashes and double quotes only', () => {
    assert.strictEqual(escapeCatalogString('Say "hi" \\ bye\t!'), 'Say \\"hi\\" \\\\ bye\t!');
  });

  it('should escape in serialized output', () => {
    const catalog = new Catalog();
    catalog.record('C:\\temp "x"', { source: 'a.sql', line: 1 });

    assert.strictEqual(catalog.serialize(), '#: a.sql:1\nmsgid "C:\\\\temp \\"x\\""\nmsgstr ""\n\n');
  });
});
