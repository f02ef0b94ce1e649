import {
  ArtifactStore,
  LineEnding,
  applyLineEnding,
  detectLineEnding,
  encodeText,
  parseArtifact,
  serializeArtifact,
  stripBom
} from './artifact-store.js';
import { ArtifactEncoding } from './types.js';
import { ArtifactNotFoundError, WriteError } from './errors.js';

/**
 * In-memory artifact store keyed by path. For tests and dry runs.
 */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly files = new Map<string, string>();

  /** Paths that reject writes, to exercise WriteError handling */
  readonly readOnly = new Set<string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, text] of Object.entries(initial)) {
      this.files.set(filePath, text);
    }
  }

  exists(filePath: string): boolean {
    return this.files.has(filePath);
  }

  readText(filePath: string, role = 'artifact'): string {
    const text = this.files.get(filePath);
    if (text === undefined) {
      throw new ArtifactNotFoundError(filePath, role);
    }
    return stripBom(text);
  }

  load(filePath: string, role = 'artifact'): Document {
    return parseArtifact(this.readText(filePath, role), filePath);
  }

  lineEnding(filePath: string): LineEnding {
    const text = this.files.get(filePath);
    return text === undefined ? '\n' : detectLineEnding(text);
  }

  save(doc: Document, filePath: string, encoding: ArtifactEncoding, lineEnding?: LineEnding): void {
    this.saveText(serializeArtifact(doc), filePath, encoding, lineEnding);
  }

  saveText(text: string, filePath: string, encoding: ArtifactEncoding, lineEnding = this.lineEnding(filePath)): void {
    if (this.readOnly.has(filePath)) {
      throw new WriteError(filePath, new Error('read-only'));
    }
    this.files.set(filePath, encodeText(applyLineEnding(text, lineEnding), encoding));
  }

  deleteIfExists(filePath: string): boolean {
    return this.files.delete(filePath);
  }

  /** Stored text exactly as written, including any byte order mark */
  raw(filePath: string): string | undefined {
    return this.files.get(filePath);
  }
}
