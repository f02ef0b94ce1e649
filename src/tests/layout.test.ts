import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { RepositoryLayout, loadTypeGroups, resolveRepositoryRoot, typeGroup } from '../layout.js';
import { DUMP_INDEX, STRUCTURAL_INDEX } from '../index-editor.js';
import { ConfigError } from '../errors.js';

const { describe, it, beforeEach, afterEach } = test;

describe('typeGroup', () => {

  it('should pluralize regular type names', () => {
    assert.strictEqual(typeGroup('Catalog'), 'Catalogs');
    assert.strictEqual(typeGroup('Document'), 'Documents');
    assert.strictEqual(typeGroup('InformationRegister'), 'InformationRegisters');
  });

  it('should use the shipped table for irregular plurals', () => {
    assert.strictEqual(typeGroup('ChartOfAccounts'), 'ChartsOfAccounts');
    assert.strictEqual(typeGroup('BusinessProcess'), 'BusinessProcesses');
    assert.strictEqual(typeGroup('FilterCriterion'), 'FilterCriteria');
  });

  it('should accept a custom table', () => {
    assert.strictEqual(typeGroup('Catalog', { Catalog: 'Directories' }), 'Directories');
  });
});

describe('RepositoryLayout', () => {

  it('should derive definition and index paths', () => {
    const layout = new RepositoryLayout('/repo', {});

    assert.strictEqual(layout.definitionPath({ type: 'Catalog', name: 'Items' }), path.join('/repo', 'Catalogs', 'Items.xml'));
    assert.strictEqual(layout.indexPath(STRUCTURAL_INDEX), path.join('/repo', 'Configuration.xml'));
    assert.strictEqual(layout.indexPath(DUMP_INDEX), path.join('/repo', 'ConfigDumpInfo.xml'));
  });
});

describe('resolveRepositoryRoot / loadTypeGroups', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'metaclone-layout-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should descend into the configuration folder when present', () => {
    fs.mkdirSync(path.join(tempDir, 'Configuration'));

    assert.strictEqual(resolveRepositoryRoot(tempDir, 'Configuration'), path.join(tempDir, 'Configuration'));
  });

  it('should use the root itself otherwise', () => {
    fs.writeFileSync(path.join(tempDir, 'Configuration'), 'a file, not a folder');

    assert.strictEqual(resolveRepositoryRoot(tempDir, 'Configuration'), tempDir);
    assert.strictEqual(resolveRepositoryRoot(tempDir, ''), tempDir);
  });

  it('should reject a table with non-string values', () => {
    const file = path.join(tempDir, 'groups.json');
    fs.writeFileSync(file, JSON.stringify({ Catalog: 3 }));

    assert.throws(() => loadTypeGroups(file), ConfigError);
  });
});
