import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseArtifact, serializeArtifact } from '../artifact-store.js';
import {
  DUMP_INDEX,
  IndexSchema,
  STRUCTURAL_INDEX,
  createRecord,
  findRecord,
  findRecords,
  insertAfterLastOfType,
  listRecords,
  recordCollection,
  recordName,
  recordType,
  removeRecord
} from '../index-editor.js';
import { MalformedArtifactError } from '../errors.js';
import { SequenceIds, XR, readFixture, sequenceId } from './helpers.js';

const { describe, it } = test;

function types(doc: Document, schema: IndexSchema): string[] {
  return listRecords(doc, schema).map(r => recordType(r, schema));
}

function names(doc: Document, schema: IndexSchema): string[] {
  return listRecords(doc, schema).map(recordName);
}

describe('structural index', () => {

  it('should list records with their element type', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');

    assert.deepStrictEqual(types(doc, STRUCTURAL_INDEX), ['Language', 'Catalog', 'Catalog', 'Document']);
    assert.deepStrictEqual(names(doc, STRUCTURAL_INDEX), ['English', 'Catalog.Items', 'Catalog.Units', 'Document.Orders']);
  });

  it('should find records by exact qualified name only', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');

    assert.strictEqual(findRecord(doc, STRUCTURAL_INDEX, 'Catalog.Units')?.textContent, 'Catalog.Units');
    assert.strictEqual(findRecord(doc, STRUCTURAL_INDEX, 'Catalog.Unit'), undefined);
    assert.strictEqual(findRecord(doc, STRUCTURAL_INDEX, 'catalog.units'), undefined);
  });

  it('should insert after the last record of the same type with its indentation', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');
    const record = createRecord(doc, STRUCTURAL_INDEX, 'Catalog.Widgets', new SequenceIds());
    const outcome = insertAfterLastOfType(doc, STRUCTURAL_INDEX, 'Catalog', record);

    assert.deepStrictEqual(outcome, { position: 'after', anchor: 'Catalog.Units' });
    assert.ok(serializeArtifact(doc).includes(
      '\t\t\t<Catalog>Catalog.Units</Catalog>\n' +
      '\t\t\t<Catalog>Catalog.Widgets</Catalog>\n' +
      '\t\t\t<Document>Document.Orders</Document>'
    ));
  });

  it('should restore the previous text when the inserted record is removed', () => {
    const text = readFixture('Configuration.xml');
    const doc = parseArtifact(text, 'Configuration.xml');
    insertAfterLastOfType(doc, STRUCTURAL_INDEX, 'Catalog',
      createRecord(doc, STRUCTURAL_INDEX, 'Catalog.Widgets', new SequenceIds()));

    const inserted = findRecord(doc, STRUCTURAL_INDEX, 'Catalog.Widgets');
    assert.ok(inserted);
    assert.strictEqual(removeRecord(inserted), true);
    assert.strictEqual(serializeArtifact(doc), text);
  });

  it('should treat removing a detached record as a no-op', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');
    const record = findRecord(doc, STRUCTURAL_INDEX, 'Catalog.Items');
    assert.ok(record);

    assert.strictEqual(removeRecord(record), true);
    assert.strictEqual(removeRecord(record), false);
    assert.deepStrictEqual(names(doc, STRUCTURAL_INDEX), ['English', 'Catalog.Units', 'Document.Orders']);
  });

  it('should append at the end of the collection when the type has no records', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');
    const record = createRecord(doc, STRUCTURAL_INDEX, 'Report.Sales', new SequenceIds());
    const outcome = insertAfterLastOfType(doc, STRUCTURAL_INDEX, 'Report', record);

    assert.deepStrictEqual(outcome, { position: 'appended' });
    assert.ok(serializeArtifact(doc).includes(
      '\t\t\t<Document>Document.Orders</Document>\n' +
      '\t\t\t<Report>Report.Sales</Report>\n' +
      '\t\t</ChildObjects>'
    ));
  });

  it('should indent the first record of an empty collection one level deeper', () => {
    const doc = parseArtifact('<root>\n\t<ChildObjects>\n\t</ChildObjects>\n</root>', 'Configuration.xml');
    const record = createRecord(doc, STRUCTURAL_INDEX, 'Catalog.Widgets', new SequenceIds());
    insertAfterLastOfType(doc, STRUCTURAL_INDEX, 'Catalog', record);

    assert.strictEqual(
      serializeArtifact(doc),
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
      '<root>\n\t<ChildObjects>\n\t\t<Catalog>Catalog.Widgets</Catalog>\n\t</ChildObjects>\n</root>'
    );
  });

  it('should keep groups contiguous across several insertions', () => {
    const doc = parseArtifact(readFixture('Configuration.xml'), 'Configuration.xml');
    const ids = new SequenceIds();
    for (const name of ['Catalog.A', 'Document.B', 'Catalog.C']) {
      const type = name.split('.')[0];
      insertAfterLastOfType(doc, STRUCTURAL_INDEX, type, createRecord(doc, STRUCTURAL_INDEX, name, ids));
    }

    assert.deepStrictEqual(names(doc, STRUCTURAL_INDEX), [
      'English', 'Catalog.Items', 'Catalog.Units', 'Catalog.A', 'Catalog.C', 'Document.Orders', 'Document.B'
    ]);
  });

  it('should fail when the record collection is missing', () => {
    const doc = parseArtifact('<root><Other/></root>', 'Configuration.xml');

    assert.throws(() => listRecords(doc, STRUCTURAL_INDEX), MalformedArtifactError);
  });

  it('should name the given path when the record collection is missing', () => {
    const doc = parseArtifact('<root><Other/></root>', 'Configuration.xml');

    assert.throws(
      () => recordCollection(doc, STRUCTURAL_INDEX, '/repo/Configuration.xml'),
      (err: unknown) => err instanceof MalformedArtifactError && err.path === '/repo/Configuration.xml'
    );
  });
});

describe('dump index', () => {

  it('should group records by qualified-name prefix', () => {
    const doc = parseArtifact(readFixture('ConfigDumpInfo.xml'), 'ConfigDumpInfo.xml');

    assert.deepStrictEqual(types(doc, DUMP_INDEX), ['Configuration', 'Catalog', 'Catalog', 'Document']);
  });

  it('should insert a text record after the last Catalog.* record', () => {
    const doc = parseArtifact(readFixture('ConfigDumpInfo.xml'), 'ConfigDumpInfo.xml');
    const record = createRecord(doc, DUMP_INDEX, 'Catalog.Widgets', new SequenceIds());
    const outcome = insertAfterLastOfType(doc, DUMP_INDEX, 'Catalog', record);

    assert.deepStrictEqual(outcome, { position: 'after', anchor: 'Catalog.Units' });
    assert.ok(serializeArtifact(doc).includes(
      '\t\t<Metadata>Catalog.Units</Metadata>\n' +
      '\t\t<Metadata>Catalog.Widgets</Metadata>\n' +
      '\t\t<Metadata>Document.Orders</Metadata>'
    ));
  });

  it('should copy the nested name/id shape and give the record a fresh id', () => {
    const text = [
      `<ConfigDumpInfo xmlns:xr="${XR}">`,
      '\t<xr:ConfigVersions>',
      '\t\t<xr:Metadata>',
      '\t\t\t<xr:name>Catalog.Items</xr:name>',
      '\t\t\t<xr:id>11111111-1111-4111-8111-111111111111</xr:id>',
      '\t\t</xr:Metadata>',
      '\t</xr:ConfigVersions>',
      '</ConfigDumpInfo>'
    ].join('\n');
    const doc = parseArtifact(text, 'ConfigDumpInfo.xml');
    const record = createRecord(doc, DUMP_INDEX, 'Catalog.Widgets', new SequenceIds());
    insertAfterLastOfType(doc, DUMP_INDEX, 'Catalog', record);

    assert.deepStrictEqual(names(doc, DUMP_INDEX), ['Catalog.Items', 'Catalog.Widgets']);
    assert.ok(serializeArtifact(doc).includes(
      '\t\t</xr:Metadata>\n' +
      '\t\t<xr:Metadata>\n' +
      '\t\t\t<xr:name>Catalog.Widgets</xr:name>\n' +
      `\t\t\t<xr:id>${sequenceId(1)}</xr:id>\n` +
      '\t\t</xr:Metadata>\n' +
      '\t</xr:ConfigVersions>'
    ));
  });

  it('should copy the attribute shape', () => {
    const text = [
      '<ConfigDumpInfo>',
      '\t<ConfigVersions>',
      '\t\t<Metadata name="Catalog.Items" id="11111111-1111-4111-8111-111111111111" configVersion="abc"/>',
      '\t\t<Metadata name="Document.Orders" id="22222222-2222-4222-8222-222222222222" configVersion="def"/>',
      '\t</ConfigVersions>',
      '</ConfigDumpInfo>'
    ].join('\n');
    const doc = parseArtifact(text, 'ConfigDumpInfo.xml');
    const record = createRecord(doc, DUMP_INDEX, 'Catalog.Widgets', new SequenceIds());
    insertAfterLastOfType(doc, DUMP_INDEX, 'Catalog', record);

    assert.deepStrictEqual(names(doc, DUMP_INDEX), ['Catalog.Items', 'Catalog.Widgets', 'Document.Orders']);
    assert.ok(serializeArtifact(doc).includes(`\t\t<Metadata name="Catalog.Widgets" id="${sequenceId(1)}"/>\n`));
  });

  it('should find every duplicate of a qualified name', () => {
    const text = '<i><ConfigVersions><Metadata>Catalog.W</Metadata><Metadata>Catalog.W</Metadata></ConfigVersions></i>';
    const doc = parseArtifact(text, 'ConfigDumpInfo.xml');

    assert.strictEqual(findRecords(doc, DUMP_INDEX, 'Catalog.W').length, 2);
  });
});
