import { ArtifactStore, parseArtifact } from './artifact-store.js';
import { ArtifactNotFoundError, InvalidCloneRequestError } from './errors.js';
import { IdentifierGenerator } from './identifiers.js';
import {
  INDEX_SCHEMAS,
  IndexSchema,
  createRecord,
  findRecords,
  recordCollection,
  insertAfterLastOfType,
  removeRecord
} from './index-editor.js';
import { RepositoryLayout } from './layout.js';
import { CloneLogger } from './logger.js';
import { IdentifierRole, regenerateIdentifiers, rewriteQualifiedNames } from './rewrite.js';
import {
  ArtifactEncoding,
  CloneReport,
  CloneRequest,
  EntityRef,
  IndexKind,
  IndexInsertion,
  NamespaceMap,
  qualifiedName
} from './types.js';

/**
 * Everything a clone run needs besides the request itself.
 */
export interface CloneEngineOptions {
  layout: RepositoryLayout;
  store: ArtifactStore;
  ids: IdentifierGenerator;
  logger: CloneLogger;
  namespaces: NamespaceMap;
  encoding?: ArtifactEncoding;
  identityAttribute?: string;
  regenerateNestedIdentities?: boolean;
  roles?: readonly IdentifierRole[];
  indexes?: readonly IndexSchema[];
}

const NAME_PATTERN = /^[\p{L}_][\p{L}\p{N}_]*$/u;

/**
 * Reject requests that cannot name files or qualified names safely.
 */
export function validateCloneRequest(request: CloneRequest): void {
  const fields: Array<[string, string]> = [
    ['type', request.type],
    ['donorName', request.donorName],
    ['cloneName', request.cloneName]
  ];
  for (const [field, value] of fields) {
    if (!value) {
      throw new InvalidCloneRequestError(`${field} must not be empty`, { field });
    }
    if (!NAME_PATTERN.test(value)) {
      throw new InvalidCloneRequestError(`${field} is not a valid name: ${value}`, { field, value });
    }
  }
  if (request.donorName === request.cloneName) {
    throw new InvalidCloneRequestError('Clone name must differ from donor name', { name: request.donorName });
  }
}

/**
 * One clone-and-integrate run. Holds the paths and documents of the run and
 * walks the phases in order: preflight, cleanup, duplicate, regenerate,
 * persist, integrate. Any error aborts the remaining phases.
 */
export class ClonePipeline {
  readonly donor: EntityRef;
  readonly clone: EntityRef;
  readonly donorPath: string;
  readonly clonePath: string;

  private readonly options: CloneEngineOptions;
  private readonly encoding: ArtifactEncoding;
  private readonly identityAttribute: string;
  private readonly indexes: readonly IndexSchema[];

  /** Clone definition text after the name rewrite (duplicate phase) */
  private cloneText: string | null = null;

  /** Clone definition document carried from regenerate into persistence */
  private cloneDocument: Document | null = null;

  private readonly report: CloneReport;

  constructor(request: CloneRequest, options: CloneEngineOptions) {
    validateCloneRequest(request);

    this.options = options;
    this.encoding = options.encoding ?? 'utf-8';
    this.identityAttribute = options.identityAttribute ?? 'uuid';
    this.indexes = options.indexes ?? INDEX_SCHEMAS;

    this.donor = { type: request.type, name: request.donorName };
    this.clone = { type: request.type, name: request.cloneName };
    this.donorPath = options.layout.definitionPath(this.donor);
    this.clonePath = options.layout.definitionPath(this.clone);

    this.report = {
      donor: qualifiedName(this.donor),
      clone: qualifiedName(this.clone),
      cloneFile: this.clonePath,
      replacedExisting: false,
      removedRecords: { structural: 0, dump: 0 },
      regeneratedIdentifiers: 0,
      insertions: []
    };
  }

  run(): CloneReport {
    this.preflight();
    this.cleanup();
    this.duplicate();
    this.regenerate();
    this.persistClone();
    this.integrate();
    return this.report;
  }

  /**
   * Check every input before the first write, so a missing donor or index
   * leaves the repository untouched.
   */
  preflight(): void {
    const { store, layout } = this.options;
    for (const schema of this.indexes) {
      const indexPath = layout.indexPath(schema);
      if (!store.exists(indexPath)) {
        throw new ArtifactNotFoundError(indexPath, `${schema.kind} index`);
      }
    }
    if (!store.exists(this.donorPath)) {
      throw new ArtifactNotFoundError(this.donorPath, 'donor definition');
    }
  }

  /**
   * Remove every trace of a previous clone so re-runs converge.
   */
  cleanup(): void {
    const { store, layout, logger } = this.options;
    const cloneName = qualifiedName(this.clone);
    logger.step(`Removing traces of ${cloneName}`);

    if (store.deleteIfExists(this.clonePath)) {
      this.report.replacedExisting = true;
      logger.success(`Removed old definition ${this.clonePath}`);
    }

    for (const schema of this.indexes) {
      const indexPath = layout.indexPath(schema);
      const doc = this.loadIndex(schema, indexPath);
      const stale = findRecords(doc, schema, cloneName);
      if (stale.length === 0) continue;

      for (const record of stale) {
        removeRecord(record);
      }
      store.save(doc, indexPath, this.encoding);
      this.countRemoved(schema.kind, stale.length);
      logger.success(`Removed ${stale.length} record(s) for ${cloneName} from ${schema.fileName}`);
    }
  }

  /**
   * Copy the donor definition text and rename the entity inside it.
   */
  duplicate(): string {
    const { store, logger } = this.options;
    logger.step(`Duplicating ${qualifiedName(this.donor)} as ${qualifiedName(this.clone)}`);

    const donorText = store.readText(this.donorPath, 'donor definition');
    this.cloneText = rewriteQualifiedNames(donorText, this.donor.name, this.clone.name);
    logger.success('Rewrote qualified names');
    return this.cloneText;
  }

  /**
   * Parse the renamed text and give it fresh identifiers.
   */
  regenerate(): Document {
    const { logger, ids, namespaces } = this.options;
    const text = this.cloneText ?? this.duplicate();

    logger.step('Regenerating identifiers');
    const doc = parseArtifact(text, this.clonePath);
    const count = regenerateIdentifiers(doc, {
      entity: qualifiedName(this.clone),
      identityAttribute: this.identityAttribute,
      namespaces,
      roles: this.options.roles,
      regenerateNested: this.options.regenerateNestedIdentities ?? true,
      ids
    });
    this.report.regeneratedIdentifiers = count;
    this.cloneDocument = doc;
    logger.success(`Regenerated ${count} identifiers`);
    return doc;
  }

  /**
   * Write the clone definition, creating its folder when needed.
   * Line endings follow the donor's.
   */
  persistClone(): void {
    const { store, logger } = this.options;
    const doc = this.cloneDocument ?? this.regenerate();
    store.save(doc, this.clonePath, this.encoding, store.lineEnding(this.donorPath));
    logger.success(`Saved clone definition ${this.clonePath}`);
  }

  /**
   * Register the clone in every index after the last record of its type.
   */
  integrate(): IndexInsertion[] {
    const { store, layout, logger, ids } = this.options;
    const cloneName = qualifiedName(this.clone);
    logger.step(`Registering ${cloneName}`);

    for (const schema of this.indexes) {
      const indexPath = layout.indexPath(schema);
      const doc = this.loadIndex(schema, indexPath);
      const record = createRecord(doc, schema, cloneName, ids);
      const outcome = insertAfterLastOfType(doc, schema, this.clone.type, record);
      store.save(doc, indexPath, this.encoding);

      this.report.insertions.push({ index: schema.kind, file: indexPath, outcome });
      if (outcome.position === 'after') {
        logger.success(`Inserted ${cloneName} after ${outcome.anchor} in ${schema.fileName}`);
      } else {
        logger.warn(`No ${this.clone.type} records in ${schema.fileName}; appended ${cloneName} at the end`);
      }
    }
    return this.report.insertions;
  }

  private loadIndex(schema: IndexSchema, indexPath: string): Document {
    const doc = this.options.store.load(indexPath, `${schema.kind} index`);
    recordCollection(doc, schema, indexPath);
    return doc;
  }

  private countRemoved(kind: IndexKind, n: number): void {
    this.report.removedRecords[kind] += n;
  }
}

/**
 * Clone an entity and register the copy. Safe to re-run with the same request.
 */
export function cloneEntity(request: CloneRequest, options: CloneEngineOptions): CloneReport {
  return new ClonePipeline(request, options).run();
}
