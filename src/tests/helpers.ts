import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import { IdentifierGenerator } from '../identifiers.js';
import { MemoryArtifactStore } from '../memory-store.js';

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export const XR = 'http://v8.1c.ru/8.3/xcf/readable';

/** Repository root used with the in-memory store */
export const MEMORY_ROOT = path.join(path.sep, 'repo');

export const UUID_GLOBAL = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi;

export function readFixture(relative: string): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, relative), 'utf-8');
}

/**
 * Predictable identifiers: 00000000-0000-4000-8000-000000000001, ...002, ...
 */
export class SequenceIds implements IdentifierGenerator {
  count = 0;

  next(): string {
    this.count++;
    return sequenceId(this.count);
  }
}

export function sequenceId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

/**
 * Copy the fixture repository into a directory.
 */
export function copyFixtureRepository(targetDir: string): void {
  fs.cpSync(FIXTURES_DIR, targetDir, { recursive: true });
}

/**
 * In-memory store seeded with the fixture repository under MEMORY_ROOT.
 */
export function createFixtureStore(): MemoryArtifactStore {
  return new MemoryArtifactStore({
    [path.join(MEMORY_ROOT, 'Configuration.xml')]: readFixture('Configuration.xml'),
    [path.join(MEMORY_ROOT, 'ConfigDumpInfo.xml')]: readFixture('ConfigDumpInfo.xml'),
    [path.join(MEMORY_ROOT, 'Catalogs', 'Items.xml')]: readFixture(path.join('Catalogs', 'Items.xml'))
  });
}
