import fs from 'fs-extra';
import * as path from 'node:path';
import { Paths } from './paths.js';
import { IndexSchema } from './index-editor.js';
import { EntityRef } from './types.js';
import { ConfigError } from './errors.js';

/** Irregular plural folder names, keyed by metadata type */
export type TypeGroupTable = Record<string, string>;

let cachedTypeGroups: TypeGroupTable | null = null;

function isTypeGroupTable(value: unknown): value is TypeGroupTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(v => typeof v === 'string');
}

/**
 * Load the irregular plural table shipped in config/type-groups.json
 */
export function loadTypeGroups(file: string = Paths.typeGroups): TypeGroupTable {
  if (cachedTypeGroups && file === Paths.typeGroups) return cachedTypeGroups;

  const raw: unknown = fs.readJsonSync(file);
  if (!isTypeGroupTable(raw)) {
    throw new ConfigError(`Type group table must map type names to folder names: ${file}`, { file });
  }
  if (file === Paths.typeGroups) cachedTypeGroups = raw;
  return raw;
}

/**
 * Folder holding definitions of a type: "Catalog" -> "Catalogs".
 */
export function typeGroup(type: string, table: TypeGroupTable = loadTypeGroups()): string {
  return table[type] ?? `${type}s`;
}

/**
 * Resolve the directory that actually holds Configuration.xml. A dump is
 * often nested one level down in a "Configuration" folder.
 */
export function resolveRepositoryRoot(root: string, configDir: string): string {
  const nested = path.join(root, configDir);
  if (configDir && fs.pathExistsSync(nested) && fs.statSync(nested).isDirectory()) {
    return nested;
  }
  return root;
}

/**
 * File paths of one repository.
 */
export class RepositoryLayout {
  constructor(
    readonly root: string,
    private readonly typeGroups: TypeGroupTable = loadTypeGroups()
  ) {}

  definitionPath(ref: EntityRef): string {
    return path.join(this.root, typeGroup(ref.type, this.typeGroups), `${ref.name}.xml`);
  }

  indexPath(schema: IndexSchema): string {
    return path.join(this.root, schema.fileName);
  }
}
