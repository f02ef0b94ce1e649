/**
 * Error model for clone runs. Every failure aborts the run; callers report
 * the kind and the path or entity involved.
 */

export type ErrorMetadata = Record<string, unknown>;

export type CloneErrorKind =
  | 'ArtifactNotFound'
  | 'MalformedArtifact'
  | 'MissingIdentifierNodes'
  | 'WriteError'
  | 'InvalidCloneRequest'
  | 'ConfigError';

/** Base for all errors raised by the tool. Keeps instanceof working. */
export class CloneError extends Error {
  readonly kind: CloneErrorKind;
  readonly metadata: ErrorMetadata | undefined;

  constructor(kind: CloneErrorKind, message: string, metadata?: ErrorMetadata, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.kind = kind;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An expected input file is missing. */
export class ArtifactNotFoundError extends CloneError {
  readonly path: string;

  constructor(path: string, role: string) {
    super('ArtifactNotFound', `${role} not found: ${path}`, { path, role });
    this.path = path;
  }
}

/** File content could not be parsed, or lacks a structure every artifact must have. */
export class MalformedArtifactError extends CloneError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('MalformedArtifact', `Malformed artifact ${path}: ${reason}`, { path, reason });
    this.path = path;
  }
}

/** The donor definition does not carry the identifier nodes a clone needs. */
export class MissingIdentifierNodesError extends CloneError {
  constructor(entity: string, role: string) {
    super('MissingIdentifierNodes', `No ${role} nodes found in definition of ${entity}`, { entity, role });
  }
}

export class WriteError extends CloneError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('WriteError', `Failed to write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { path }, { cause });
    this.path = path;
  }
}

export class InvalidCloneRequestError extends CloneError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super('InvalidCloneRequest', message, metadata);
  }
}

export class ConfigError extends CloneError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super('ConfigError', message, metadata);
  }
}

/**
 * One-line description for terminal output: "<Kind>: <message>".
 */
export function describeError(err: unknown): string {
  if (err instanceof CloneError) {
    return `${err.kind}: ${err.message}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
