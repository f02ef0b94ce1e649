import { childElements, isText } from './artifact-store.js';
import { MalformedArtifactError } from './errors.js';
import { IdentifierGenerator } from './identifiers.js';
import { IndexKind, InsertOutcome } from './types.js';

/**
 * How registration records are grouped by type inside an index.
 * - element: the record's element name is the type (<Catalog>Catalog.Items</Catalog>)
 * - prefix: the record's qualified name starts with "Type."
 */
export type RecordGrouping = 'element' | 'prefix';

/**
 * Describes where an index keeps its registration records.
 */
export interface IndexSchema {
  kind: IndexKind;

  /** File name relative to the repository root */
  fileName: string;

  /** Local name of the element holding the records */
  collection: string;

  /** Local name of record elements; every element child is a record when absent */
  record?: string;

  grouping: RecordGrouping;
}

export const STRUCTURAL_INDEX: IndexSchema = {
  kind: 'structural',
  fileName: 'Configuration.xml',
  collection: 'ChildObjects',
  grouping: 'element'
};

export const DUMP_INDEX: IndexSchema = {
  kind: 'dump',
  fileName: 'ConfigDumpInfo.xml',
  collection: 'ConfigVersions',
  record: 'Metadata',
  grouping: 'prefix'
};

export const INDEX_SCHEMAS: readonly IndexSchema[] = [STRUCTURAL_INDEX, DUMP_INDEX];

function localNameOf(el: Element): string {
  if (el.localName) return el.localName;
  const parts = el.nodeName.split(':');
  return parts[parts.length - 1];
}

function firstElement(root: Element, localName: string): Element | undefined {
  if (localNameOf(root) === localName) return root;
  for (const child of childElements(root)) {
    const found = firstElement(child, localName);
    if (found) return found;
  }
  return undefined;
}

function childByName(el: Element, localName: string): Element | undefined {
  return childElements(el).find(child => localNameOf(child) === localName);
}

function isWhitespace(node: Node | null): node is Text {
  return node !== null && isText(node) && node.data.trim() === '';
}

/**
 * Whitespace text that indents an element, if any
 */
function indentBefore(el: Element): string | undefined {
  const prev = el.previousSibling;
  return isWhitespace(prev) ? prev.data : undefined;
}

/**
 * Locate the element holding an index's records.
 * filePath names the artifact in the error when the collection is missing.
 */
export function recordCollection(doc: Document, schema: IndexSchema, filePath = schema.fileName): Element {
  const found = firstElement(doc.documentElement, schema.collection);
  if (!found) {
    throw new MalformedArtifactError(filePath, `record collection <${schema.collection}> not found`);
  }
  return found;
}

/**
 * All registration records of an index, in document order.
 */
export function listRecords(doc: Document, schema: IndexSchema, filePath?: string): Element[] {
  const records = childElements(recordCollection(doc, schema, filePath));
  const { record } = schema;
  return record ? records.filter(el => localNameOf(el) === record) : records;
}

/**
 * Qualified name a record registers. Read from a <name> child, a name
 * attribute, or the record's own text, in that order.
 */
export function recordName(record: Element): string {
  const nameChild = childByName(record, 'name');
  if (nameChild) return (nameChild.textContent ?? '').trim();
  if (record.hasAttribute('name')) return record.getAttribute('name') ?? '';
  return (record.textContent ?? '').trim();
}

/**
 * Type group a record belongs to.
 */
export function recordType(record: Element, schema: IndexSchema): string {
  if (schema.grouping === 'element') return localNameOf(record);
  const name = recordName(record);
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

export function findRecords(doc: Document, schema: IndexSchema, qualifiedName: string): Element[] {
  return listRecords(doc, schema).filter(record => recordName(record) === qualifiedName);
}

/**
 * First record registering exactly this qualified name.
 */
export function findRecord(doc: Document, schema: IndexSchema, qualifiedName: string): Element | undefined {
  return findRecords(doc, schema, qualifiedName)[0];
}

/**
 * Detach a record together with the whitespace indenting it.
 * Returns false when the record had no parent.
 */
export function removeRecord(record: Element): boolean {
  const parent = record.parentNode;
  if (!parent) return false;

  const prev = record.previousSibling;
  if (isWhitespace(prev)) {
    parent.removeChild(prev);
  }
  parent.removeChild(record);
  return true;
}

function createElementLike(doc: Document, like: Element, localName: string): Element {
  const ns = like.namespaceURI;
  const tag = like.prefix ? `${like.prefix}:${localName}` : localName;
  return ns ? doc.createElementNS(ns, tag) : doc.createElement(tag);
}

function lastOfType(records: Element[], schema: IndexSchema, type: string): Element | undefined {
  let last: Element | undefined;
  for (const record of records) {
    if (recordType(record, schema) === type) last = record;
  }
  return last;
}

/**
 * Build a registration record for a qualified name.
 *
 * Records take the namespace and shape of an existing record of the index:
 * nested (<name>/<id> children) and attribute (name/id attributes) shapes
 * get a fresh id. An index with no records gets a plain text record.
 */
export function createRecord(
  doc: Document,
  schema: IndexSchema,
  qualifiedName: string,
  ids: IdentifierGenerator
): Element {
  const collection = recordCollection(doc, schema);
  const records = listRecords(doc, schema);
  const type = qualifiedName.split('.')[0];

  if (schema.grouping === 'element') {
    const like = lastOfType(records, schema, type) ?? records[records.length - 1] ?? collection;
    const record = createElementLike(doc, like, type);
    record.appendChild(doc.createTextNode(qualifiedName));
    return record;
  }

  const template = records[records.length - 1];
  const localName = schema.record ?? 'Metadata';
  const record = createElementLike(doc, template ?? collection, localName);

  const nameChild = template ? childByName(template, 'name') : undefined;
  if (template && nameChild) {
    const inner = indentBefore(nameChild);
    const closing = template.lastChild;

    const name = createElementLike(doc, nameChild, 'name');
    name.appendChild(doc.createTextNode(qualifiedName));
    const id = createElementLike(doc, nameChild, 'id');
    id.appendChild(doc.createTextNode(ids.next()));

    for (const child of [name, id]) {
      if (inner !== undefined) record.appendChild(doc.createTextNode(inner));
      record.appendChild(child);
    }
    if (isWhitespace(closing)) record.appendChild(doc.createTextNode(closing.data));
    return record;
  }

  if (template && template.hasAttribute('name')) {
    record.setAttribute('name', qualifiedName);
    record.setAttribute('id', ids.next());
    return record;
  }

  record.appendChild(doc.createTextNode(qualifiedName));
  return record;
}

/**
 * Insert a record right after the last record of the same type, copying
 * that record's indentation. With no record of the type, append it as the
 * last child of the collection.
 */
export function insertAfterLastOfType(
  doc: Document,
  schema: IndexSchema,
  type: string,
  record: Element
): InsertOutcome {
  const collection = recordCollection(doc, schema);
  const anchor = lastOfType(listRecords(doc, schema), schema, type);

  if (anchor && anchor.parentNode) {
    const parent = anchor.parentNode;
    const next = anchor.nextSibling;
    const indent = indentBefore(anchor);
    if (indent !== undefined) {
      parent.insertBefore(doc.createTextNode(indent), next);
    }
    parent.insertBefore(record, next);
    return { position: 'after', anchor: recordName(anchor) };
  }

  const elements = childElements(collection);
  const lastElement = elements[elements.length - 1];
  const trailing = collection.lastChild;

  let indent: string | undefined;
  if (lastElement) {
    indent = indentBefore(lastElement);
  } else if (isWhitespace(trailing)) {
    indent = `${trailing.data}\t`;
  }

  const before = isWhitespace(trailing) ? trailing : null;
  if (indent !== undefined) {
    collection.insertBefore(doc.createTextNode(indent), before);
  }
  collection.insertBefore(record, before);
  return { position: 'appended' };
}
