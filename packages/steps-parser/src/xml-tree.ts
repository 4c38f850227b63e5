/**
 * Namespace-aware element tree on top of fast-xml-parser.
 *
 * fast-xml-parser keeps qualified names ("cfdi:Emisor") but does not resolve
 * prefixes. This module resolves every element against the xmlns
 * declarations in scope so lookups can be made by namespace URI instead of
 * by whatever prefix a given issuer happened to choose.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlElement {
  /** Qualified name as written */
  name: string;
  localName: string;
  /** Resolved namespace URI; '' when the element is in no namespace */
  namespaceUri: string;
  attributes: Record<string, string>;
  /** Namespace declarations made on this element, prefix ('' for default) to URI */
  declaredNamespaces: Map<string, string>;
  children: XmlElement[];
}

/**
 * Raised for markup that cannot be turned into a tree
 */
export class XmlStructureError extends Error {
  readonly kind: 'malformed' | 'unsupported-root';

  constructor(message: string, kind: 'malformed' | 'unsupported-root' = 'malformed') {
    super(message);
    this.name = 'XmlStructureError';
    this.kind = kind;
  }
}

const ATTRIBUTE_PREFIX = '@_';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: false,
  // Keep every attribute and text value verbatim: amounts must not be re-formatted
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // Also decodes numeric character references (&#209; &#xD1;)
  htmlEntities: true,
  // Every element becomes an array so repeated and single children read the same way
  isArray: (_name, _jpath, _isLeafNode, isAttribute) => !isAttribute,
});

/**
 * Parse XML text into a namespace-resolved tree.
 *
 * @throws XmlStructureError on malformed markup or a missing root element
 */
export function parseXmlTree(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlStructureError(`Malformed XML at line ${line}, column ${col}: ${msg}`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!isRecord(parsed)) {
    throw new XmlStructureError('No root element found in XML');
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (key.startsWith('?') || key.startsWith('#')) {
      continue;
    }
    const first = Array.isArray(value) ? value[0] : value;
    return buildElement(key, first, new Map());
  }

  throw new XmlStructureError('No root element found in XML');
}

function buildElement(name: string, node: unknown, parentScope: ReadonlyMap<string, string>): XmlElement {
  const attributes: Record<string, string> = {};
  const declaredNamespaces = new Map<string, string>();
  const childEntries: [string, unknown][] = [];

  if (isRecord(node)) {
    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        const attrName = key.slice(ATTRIBUTE_PREFIX.length);
        const attrValue = typeof value === 'string' ? value : String(value);
        if (attrName === 'xmlns') {
          declaredNamespaces.set('', attrValue);
        } else if (attrName.startsWith('xmlns:')) {
          declaredNamespaces.set(attrName.slice('xmlns:'.length), attrValue);
        } else {
          attributes[attrName] = attrValue;
        }
      } else if (key !== '#text') {
        childEntries.push([key, value]);
      }
    }
  }

  const scope = declaredNamespaces.size > 0 ? new Map([...parentScope, ...declaredNamespaces]) : parentScope;
  const { prefix, localName } = splitQualifiedName(name);

  const children: XmlElement[] = [];
  for (const [childName, value] of childEntries) {
    const occurrences: unknown[] = Array.isArray(value) ? value : [value];
    for (const occurrence of occurrences) {
      children.push(buildElement(childName, occurrence, scope));
    }
  }

  return {
    name,
    localName,
    namespaceUri: scope.get(prefix) ?? '',
    attributes,
    declaredNamespaces,
    children,
  };
}

function splitQualifiedName(name: string): { prefix: string; localName: string } {
  const colon = name.indexOf(':');
  return colon >= 0
    ? { prefix: name.slice(0, colon), localName: name.slice(colon + 1) }
    : { prefix: '', localName: name };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Direct children with the given local name in one of the namespaces
 */
export function findChildren(
  element: XmlElement,
  localName: string,
  namespaces: ReadonlySet<string>,
): XmlElement[] {
  return element.children.filter(
    (child) => child.localName === localName && namespaces.has(child.namespaceUri),
  );
}

/**
 * First descendant (depth-first, document order per element name) matching
 * the local name and namespace, or undefined
 */
export function findDescendant(
  element: XmlElement,
  localName: string,
  namespaces: ReadonlySet<string>,
): XmlElement | undefined {
  for (const child of element.children) {
    if (child.localName === localName && namespaces.has(child.namespaceUri)) {
      return child;
    }
    const nested = findDescendant(child, localName, namespaces);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Every element matching `parentName/childName` anywhere below `element`
 */
export function findAllNested(
  element: XmlElement,
  parentName: string,
  childName: string,
  namespaces: ReadonlySet<string>,
): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    for (const child of node.children) {
      if (child.localName === parentName && namespaces.has(child.namespaceUri)) {
        found.push(...findChildren(child, childName, namespaces));
      }
      visit(child);
    }
  };
  visit(element);
  return found;
}

/**
 * Attribute value, treating an empty string as absent
 */
export function getAttribute(element: XmlElement | undefined, name: string): string | undefined {
  const value = element?.attributes[name];
  return value === undefined || value === '' ? undefined : value;
}
