/**
 * Reference to an entity inside a configuration repository.
 */
export interface EntityRef {
  /** Metadata type, e.g. "Catalog" */
  type: string;

  /** Entity name, unique within its type */
  name: string;
}

/**
 * What to clone and under which name.
 */
export interface CloneRequest {
  type: string;
  donorName: string;
  cloneName: string;
}

/**
 * Text encodings the artifact store can write.
 * 'utf-8-bom' prefixes the file with a byte order mark.
 */
export type ArtifactEncoding = 'utf-8' | 'utf-8-bom';

/**
 * Namespace prefix -> URI map used by identifier queries.
 */
export type NamespaceMap = Record<string, string>;

/**
 * Which index file an operation touched.
 */
export type IndexKind = 'structural' | 'dump';

/**
 * Where a registration record ended up.
 */
export type InsertOutcome =
  | { position: 'after'; anchor: string }
  | { position: 'appended' };

export interface IndexInsertion {
  index: IndexKind;
  file: string;
  outcome: InsertOutcome;
}

/**
 * Summary of one clone-and-integrate run.
 */
export interface CloneReport {
  donor: string;
  clone: string;
  cloneFile: string;

  /** Whether a previous clone definition was deleted during cleanup */
  replacedExisting: boolean;

  /** Stale registration records removed per index during cleanup */
  removedRecords: Record<IndexKind, number>;

  /** Number of identifiers written into the clone definition */
  regeneratedIdentifiers: number;

  insertions: IndexInsertion[];
}

/**
 * Build the canonical "Type.Name" string for an entity.
 */
export function qualifiedName(ref: EntityRef): string {
  return `${ref.type}.${ref.name}`;
}
