import * as xpath from 'xpath';
import { childElements, childNodes, isElement } from './artifact-store.js';
import { ConfigError, MissingIdentifierNodesError } from './errors.js';
import { IdentifierGenerator } from './identifiers.js';
import { NamespaceMap } from './types.js';

/**
 * A node role whose text holds an identifier, e.g. xr:TypeId.
 */
export interface IdentifierRole {
  prefix: string;
  localName: string;
}

export const IDENTIFIER_ROLES: readonly IdentifierRole[] = [
  { prefix: 'xr', localName: 'TypeId' },
  { prefix: 'xr', localName: 'ValueId' }
];

export interface RegenerateOptions {
  /** Qualified name of the entity, for error messages */
  entity: string;
  identityAttribute: string;
  namespaces: NamespaceMap;
  roles?: readonly IdentifierRole[];

  /** Also refresh the identity attribute of every nested object */
  regenerateNested: boolean;
  ids: IdentifierGenerator;
}

/**
 * Rename an entity inside raw definition text.
 *
 * Only two anchored forms are touched: ".Donor" (qualified-name path suffix)
 * and ">Donor<" (whole element text). Case-sensitive.
 */
export function rewriteQualifiedNames(text: string, donorName: string, cloneName: string): string {
  return text
    .split(`.${donorName}`).join(`.${cloneName}`)
    .split(`>${donorName}<`).join(`>${cloneName}<`);
}

function setText(el: Element, value: string): void {
  for (const child of childNodes(el)) {
    el.removeChild(child);
  }
  const doc = el.ownerDocument;
  el.appendChild(doc.createTextNode(value));
}

/**
 * The object a definition describes: the first child of the root element
 * carrying the identity attribute, or the root element itself.
 */
export function rootObject(doc: Document, identityAttribute: string): Element | undefined {
  const root = doc.documentElement;
  const child = childElements(root).find(el => el.hasAttribute(identityAttribute));
  if (child) return child;
  return root.hasAttribute(identityAttribute) ? root : undefined;
}

function selectRole(doc: Document, role: IdentifierRole, namespaces: NamespaceMap): Element[] {
  if (!(role.prefix in namespaces)) {
    throw new ConfigError(`No namespace configured for prefix "${role.prefix}"`, { prefix: role.prefix });
  }
  const select = xpath.useNamespaces(namespaces);
  const result = select(`//${role.prefix}:${role.localName}`, doc);
  return Array.isArray(result) ? result.filter(isElement) : [];
}

function collectWithAttribute(el: Element, attribute: string, out: Element[]): Element[] {
  for (const child of childElements(el)) {
    if (child.hasAttribute(attribute)) out.push(child);
    collectWithAttribute(child, attribute, out);
  }
  return out;
}

/**
 * Give a cloned definition its own identity. Every identifier gets a
 * separate call to the generator. Returns how many values were written.
 */
export function regenerateIdentifiers(doc: Document, options: RegenerateOptions): number {
  const { entity, identityAttribute, namespaces, ids } = options;
  const roles = options.roles ?? IDENTIFIER_ROLES;

  const root = rootObject(doc, identityAttribute);
  if (!root) {
    throw new MissingIdentifierNodesError(entity, `root object "${identityAttribute}" attribute`);
  }

  const roleNodes = roles.map(role => {
    const nodes = selectRole(doc, role, namespaces);
    if (nodes.length === 0) {
      throw new MissingIdentifierNodesError(entity, `${role.prefix}:${role.localName}`);
    }
    return nodes;
  });

  root.setAttribute(identityAttribute, ids.next());
  let count = 1;

  for (const nodes of roleNodes) {
    for (const node of nodes) {
      setText(node, ids.next());
      count++;
    }
  }

  if (options.regenerateNested) {
    for (const nested of collectWithAttribute(root, identityAttribute, [])) {
      nested.setAttribute(identityAttribute, ids.next());
      count++;
    }
  }

  return count;
}
