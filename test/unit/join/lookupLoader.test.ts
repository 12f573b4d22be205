import assert from 'assert';
import fs from 'fs/promises';
import * as path from 'path';
import { SecondaryFileUnreadableError } from '../../../src/errors';
import { loadLookupTable, prepareLookup } from '../../../src/join/lookupLoader';
import { makeConfig } from '../../lib/config';
import { createTmpDir, writeTsv } from '../../lib/files';

let tmpDir: string;

before(async () => {
  tmpDir = await createTmpDir('lookup-loader-tests');
});

after(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('loadLookupTable', () => {
  it('maps join keys to the kept columns', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'plain.tsv', 'A\tX\tY\nB\tP\tQ\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, keepColumns: [1, 2] }));

    assert.strictEqual(result.table.get('A'), 'X\tY');
    assert.strictEqual(result.table.get('B'), 'P\tQ');
    assert.strictEqual(result.table.size, 2);
    assert.strictEqual(result.header, 'NA');
    assert.strictEqual(result.rowCount, 2);
  });

  it('takes the header from the first row in header mode and does not store it', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'header.tsv', 'id\tname\tscore\nA\tX\t1\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, keepColumns: [1, 2], includeHeader: true }));

    assert.strictEqual(result.header, 'name\tscore');
    assert.strictEqual(result.table.has('id'), false);
    assert.strictEqual(result.table.get('A'), 'X\t1');
  });

  it('stores the first row when header mode is off', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'no-header.tsv', 'id\tname\nA\tX\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, keepColumns: [1] }));

    assert.strictEqual(result.table.get('id'), 'name');
  });

  it('keeps the last row for duplicate keys', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'dupes.tsv', 'A\t1\nA\t2\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, keepColumns: [1] }));

    assert.strictEqual(result.table.get('A'), '2');
    assert.strictEqual(result.table.size, 1);
  });

  it('reads missing kept columns of short rows as empty', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'short.tsv', 'A\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, keepColumns: [1, 2] }));

    assert.strictEqual(result.table.get('A'), '\t');
  });

  it('builds multi-column keys in the order given', async () => {
    const secondaryPath = await writeTsv(tmpDir, 'multi.tsv', 'A\tB\tZ\n');
    const result = await loadLookupTable(makeConfig({ secondaryPath, secondKeyColumns: [1, 0], keepColumns: [2] }));

    assert.strictEqual(result.table.get('B\tA'), 'Z');
  });

  it('fails with SecondaryFileUnreadableError when the file does not exist', async () => {
    const secondaryPath = path.join(tmpDir, 'missing.tsv');

    await assert.rejects(loadLookupTable(makeConfig({ secondaryPath })), (err: unknown) => {
      assert.ok(err instanceof SecondaryFileUnreadableError);
      assert.strictEqual(err.code, 'SECONDARY_FILE_UNREADABLE');
      assert.strictEqual(err.message, `Could not read data file ${secondaryPath}.`);
      return true;
    });
  });

  it('fails with SecondaryFileUnreadableError when no file is named', async () => {
    await assert.rejects(loadLookupTable(makeConfig()), SecondaryFileUnreadableError);
  });
});

describe('prepareLookup', () => {
  it('prefixes the loaded header', () => {
    const loaded = { table: new Map<string, string>(), header: 'name\tscore', rowCount: 1 };
    const prepared = prepareLookup(loaded, makeConfig({ prefixSecondHeader: 'f2' }));

    assert.strictEqual(prepared.header, 'f2.name\tf2.score');
    assert.strictEqual(loaded.header, 'name\tscore');
  });

  it('returns the result unchanged without a prefix', () => {
    const loaded = { table: new Map<string, string>(), header: 'NA', rowCount: 0 };
    assert.strictEqual(prepareLookup(loaded, makeConfig()), loaded);
  });
});
