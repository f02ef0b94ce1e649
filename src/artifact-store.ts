import fs from 'fs-extra';
import * as path from 'node:path';
import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { ArtifactEncoding } from './types.js';
import { ArtifactNotFoundError, MalformedArtifactError, WriteError } from './errors.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const BOM = '\uFEFF';

export type LineEnding = '\n' | '\r\n';

// DOM node type codes
const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const PROCESSING_INSTRUCTION_NODE = 7;

/**
 * Reads and writes definition and index artifacts.
 * Implementations: FileArtifactStore (disk), MemoryArtifactStore (tests).
 */
export interface ArtifactStore {
  exists(filePath: string): boolean;

  /** Raw file text without a byte order mark. Throws ArtifactNotFoundError. */
  readText(filePath: string, role?: string): string;

  /** Parse a file into a mutable document. */
  load(filePath: string, role?: string): Document;

  /** Line ending of the stored file; '\n' when it does not exist. */
  lineEnding(filePath: string): LineEnding;

  /**
   * Serialize with the canonical declaration header and overwrite the file.
   * Line endings default to those of the file being replaced.
   */
  save(doc: Document, filePath: string, encoding: ArtifactEncoding, lineEnding?: LineEnding): void;

  saveText(text: string, filePath: string, encoding: ArtifactEncoding, lineEnding?: LineEnding): void;

  /** Returns true when a file was removed. */
  deleteIfExists(filePath: string): boolean;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node): node is Text {
  return node.nodeType === TEXT_NODE;
}

function isDeclaration(node: Node): node is ProcessingInstruction {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE && node.nodeName === 'xml';
}

/**
 * Child nodes as a plain array (snapshot, safe to mutate the parent while iterating)
 */
export function childNodes(node: Node): Node[] {
  const result: Node[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child) result.push(child);
  }
  return result;
}

export function childElements(node: Node): Element[] {
  return childNodes(node).filter(isElement);
}

/**
 * Parse artifact text. Any parser error or warning, or a missing root element,
 * is fatal: the parser reports unclosed tags as warnings and closes them itself.
 */
export function parseArtifact(text: string, filePath: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    locator: {},
    errorHandler: {
      warning: (msg: string) => { problems.push(msg); },
      error: (msg: string) => { problems.push(msg); },
      fatalError: (msg: string) => { problems.push(msg); }
    }
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(stripBom(text), 'text/xml');
  } catch (err) {
    throw new MalformedArtifactError(filePath, err instanceof Error ? err.message : String(err));
  }

  if (problems.length > 0) {
    throw new MalformedArtifactError(filePath, problems[0].trim());
  }
  if (!doc || !doc.documentElement) {
    throw new MalformedArtifactError(filePath, 'no root element');
  }
  return doc;
}

/**
 * Serialize a document behind the canonical declaration header.
 * A declaration already present in the tree is dropped in favour of the header.
 */
export function serializeArtifact(doc: Document): string {
  const serializer = new XMLSerializer();
  const parts: string[] = [];

  for (const node of childNodes(doc)) {
    if (isDeclaration(node) || isText(node)) continue;
    parts.push(serializer.serializeToString(node));
  }

  return `${XML_DECLARATION}\n${parts.join('\n')}`;
}

export function detectLineEnding(text: string): LineEnding {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Rewrite line breaks to the given ending. LF text is left as it is.
 */
export function applyLineEnding(text: string, lineEnding: LineEnding): string {
  return lineEnding === '\r\n' ? text.replace(/\r?\n/g, '\r\n') : text;
}

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

export function encodeText(text: string, encoding: ArtifactEncoding): string {
  const body = stripBom(text);
  return encoding === 'utf-8-bom' ? BOM + body : body;
}

/**
 * Artifact store backed by the local file system.
 * Writes go to a temporary sibling first and are renamed over the target.
 */
export class FileArtifactStore implements ArtifactStore {
  exists(filePath: string): boolean {
    return fs.pathExistsSync(filePath);
  }

  readText(filePath: string, role = 'artifact'): string {
    if (!fs.pathExistsSync(filePath)) {
      throw new ArtifactNotFoundError(filePath, role);
    }
    return stripBom(fs.readFileSync(filePath, 'utf8'));
  }

  load(filePath: string, role = 'artifact'): Document {
    return parseArtifact(this.readText(filePath, role), filePath);
  }

  lineEnding(filePath: string): LineEnding {
    return fs.pathExistsSync(filePath) ? detectLineEnding(fs.readFileSync(filePath, 'utf8')) : '\n';
  }

  save(doc: Document, filePath: string, encoding: ArtifactEncoding, lineEnding?: LineEnding): void {
    this.saveText(serializeArtifact(doc), filePath, encoding, lineEnding);
  }

  saveText(text: string, filePath: string, encoding: ArtifactEncoding, lineEnding = this.lineEnding(filePath)): void {
    const tmp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp`);
    try {
      fs.outputFileSync(tmp, encodeText(applyLineEnding(text, lineEnding), encoding), 'utf8');
      fs.moveSync(tmp, filePath, { overwrite: true });
    } catch (err) {
      if (fs.pathExistsSync(tmp)) fs.removeSync(tmp);
      throw new WriteError(filePath, err);
    }
  }

  deleteIfExists(filePath: string): boolean {
    if (!fs.pathExistsSync(filePath)) return false;
    fs.removeSync(filePath);
    return true;
  }
}
