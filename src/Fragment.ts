import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { DOMParser } from '@xmldom/xmldom';
import { MalformedInputError } from './errors';

export interface ElementLocation {
  uri?: string;
  line: number;
  column: number;
}

/**
 * A parsed, namespace-aware element: the only input shape the checker walks
 */
export interface FragmentNode {
  name: string;
  namespace: string | null;
  attributes: Record<string, string>;
  children: FragmentNode[];
  text: string;
  location?: ElementLocation;
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function getLocation(node: Node, uri?: string): ElementLocation | undefined {
  // xmldom records positions as expando properties when a locator is configured
  const line: unknown = Reflect.get(node, 'lineNumber');
  const column: unknown = Reflect.get(node, 'columnNumber');
  if (typeof line === 'number' && typeof column === 'number' && line >= 1 && column >= 1) {
    return uri ? { uri, line, column } : { line, column };
  }
  return undefined;
}

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface PendingNode {
  value: unknown;
  parent: PendingNode | null;
}

// Paths are only built when reporting, so deep trees do not pay for them per node
function pathOf(pending: PendingNode): string {
  const names: string[] = [];
  for (let current: PendingNode | null = pending; current; current = current.parent) {
    const value = current.value;
    names.push(isRecord(value) && 'name' in value && typeof value.name === 'string' ? value.name : '?');
  }
  return names.reverse().map(name => `/${name}`).join('');
}

/**
 * Adapter between the XML parser's DOM and FragmentNode trees
 */
export class FragmentReader {
  /**
   * Parse an XML string into a fragment rooted at its document element
   * @param xml The XML source
   * @param uri Optional source URI recorded on every node location
   */
  public static fromXml(xml: string, uri?: string): FragmentNode {
    const errors: string[] = [];
    const parser = new DOMParser({
      locator: {},
      errorHandler: {
        warning: (msg: string) => console.warn(`XML warning${uri ? ` in ${uri}` : ''}: ${msg}`),
        error: (msg: string) => errors.push(msg),
        fatalError: (msg: string) => errors.push(msg)
      }
    });

    let doc: Document | undefined;
    try {
      doc = parser.parseFromString(xml, 'application/xml');
    } catch (error) {
      throw new MalformedInputError(error instanceof Error ? error.message : String(error));
    }

    if (errors.length > 0) {
      throw new MalformedInputError(errors.join('; '));
    }
    if (!doc || !doc.documentElement) {
      throw new MalformedInputError('document has no root element');
    }
    return this.fromElement(doc.documentElement, uri);
  }

  /**
   * Read and parse an XML file; node locations carry the file URL
   */
  public static fromFile(filePath: string): FragmentNode {
    const xml = fs.readFileSync(filePath, 'utf8');
    return this.fromXml(xml, pathToFileURL(path.resolve(filePath)).href);
  }

  /**
   * Convert a DOM element (and its element descendants) into a fragment
   * @throws MalformedInputError when an element uses a prefix with no namespace binding
   */
  public static fromElement(element: Element, uri?: string): FragmentNode {
    const root = this.createNode(element, uri);
    // Walk with an explicit stack; documents may nest deeper than the call stack allows
    const stack: Array<{ element: Element; node: FragmentNode }> = [{ element, node: root }];
    let entry = stack.pop();
    while (entry) {
      for (let i = 0; i < entry.element.childNodes.length; i++) {
        const child = entry.element.childNodes[i];
        if (isElement(child)) {
          const childNode = this.createNode(child, uri);
          entry.node.children.push(childNode);
          stack.push({ element: child, node: childNode });
        } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
          entry.node.text += child.nodeValue ?? '';
        }
      }
      entry = stack.pop();
    }
    return root;
  }

  private static createNode(element: Element, uri?: string): FragmentNode {
    // xmldom leaves namespaceURI unset for a prefix it could not resolve
    if (element.prefix && !element.namespaceURI) {
      throw new MalformedInputError(`unbound prefix '${element.prefix}' on element '${element.nodeName}'`);
    }

    const attributes: Record<string, string> = {};
    for (let i = 0; i < element.attributes.length; i++) {
      const attr = element.attributes.item(i);
      if (attr) {
        attributes[attr.name] = attr.value;
      }
    }

    const node: FragmentNode = {
      name: element.localName || element.nodeName,
      namespace: element.namespaceURI ?? null,
      attributes,
      children: [],
      text: ''
    };
    const location = getLocation(element, uri);
    if (location) {
      node.location = location;
    }
    return node;
  }

  /**
   * Verify at run time that a value is a FragmentNode tree (no cycles, no shared subtrees)
   */
  public static assertTree(value: unknown): asserts value is FragmentNode {
    const seen = new Set<object>();
    const stack: PendingNode[] = [{ value, parent: null }];
    let pending = stack.pop();
    while (pending) {
      const children = this.assertNode(pending, seen);
      // Reverse so that nodes are visited in document order
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ value: children[i], parent: pending });
      }
      pending = stack.pop();
    }
  }

  /**
   * Validate one node's own fields and return its unchecked children
   */
  private static assertNode(pending: PendingNode, seen: Set<object>): unknown[] {
    const value = pending.value;
    const parentPath = pending.parent ? pathOf(pending.parent) : '';
    if (!isRecord(value)) {
      throw new MalformedInputError('node is not an object', parentPath || '/');
    }
    if (!('name' in value) || typeof value.name !== 'string' || value.name.length === 0) {
      throw new MalformedInputError('node name must be a non-empty string', parentPath || '/');
    }
    const nodePath = `${parentPath}/${value.name}`;

    if (seen.has(value)) {
      throw new MalformedInputError('node is reachable more than once', nodePath);
    }
    seen.add(value);

    if (!('namespace' in value) || (value.namespace !== null && typeof value.namespace !== 'string')) {
      throw new MalformedInputError('namespace must be a string or null', nodePath);
    }
    if (!('attributes' in value) || !isRecord(value.attributes)) {
      throw new MalformedInputError('attributes must be a record', nodePath);
    }
    for (const [name, attrValue] of Object.entries(value.attributes)) {
      if (typeof attrValue !== 'string') {
        throw new MalformedInputError(`attribute '${name}' is not a string`, nodePath);
      }
    }
    if (!('text' in value) || typeof value.text !== 'string') {
      throw new MalformedInputError('text must be a string', nodePath);
    }
    if ('location' in value && value.location !== undefined) {
      const location = value.location;
      if (!isRecord(location) || !('line' in location) || typeof location.line !== 'number' ||
          !('column' in location) || typeof location.column !== 'number') {
        throw new MalformedInputError('location must carry numeric line and column', nodePath);
      }
    }
    if (!('children' in value) || !Array.isArray(value.children)) {
      throw new MalformedInputError('children must be an array', nodePath);
    }
    return value.children;
  }
}
