/**
 * XML Tree
 *
 * Thin read-only view over the object tree produced by xml2js. Parsing runs
 * synchronously: xml2js drives sax without deferral when `async` is off, so
 * the callback has fired by the time `parseString` returns.
 *
 * The document is checked with the fast-xml-parser validator first. xml2js
 * reports its result as soon as the root element closes and stops listening,
 * so content after the root never reaches its callback.
 */

import { XMLValidator } from 'fast-xml-parser';
import { Parser } from 'xml2js';
import { ParseError, toErrorMessage } from './errors.js';

// =============================================================================
// Types
// =============================================================================

const ATTR_KEY = '$';
const TEXT_KEY = '_';
const CHILDREN_KEY = '$$';
const NAME_KEY = '#name';
/** Name xml2js gives character data kept in the ordered child list */
const TEXT_NODE_NAME = '__text__';

/** An element or text node as xml2js emits it with ordered children. */
interface XmlObjectNode {
  [key: string]: unknown;
}

export interface XmlDocument {
  /** Undefined when the input held no element at all */
  readonly root: XmlElement | undefined;
}

// =============================================================================
// Element View
// =============================================================================

function isObjectNode(value: unknown): value is XmlObjectNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nodeName(node: XmlObjectNode): string | undefined {
  const name = node[NAME_KEY];
  return typeof name === 'string' ? name : undefined;
}

function orderedChildren(node: XmlObjectNode): XmlObjectNode[] {
  const entries = node[CHILDREN_KEY];
  return Array.isArray(entries) ? entries.filter(isObjectNode) : [];
}

function collectText(node: XmlObjectNode): string {
  let text = '';
  for (const child of orderedChildren(node)) {
    if (nodeName(child) === TEXT_NODE_NAME) {
      const chars = child[TEXT_KEY];
      if (typeof chars === 'string') text += chars;
    } else {
      text += collectText(child);
    }
  }
  return text;
}

export class XmlElement {
  constructor(
    readonly name: string,
    private readonly node: XmlObjectNode
  ) {}

  /**
   * Child elements with this exact name, in document order.
   */
  children(name: string): XmlElement[] {
    if (name === TEXT_NODE_NAME) {
      return [];
    }
    return orderedChildren(this.node)
      .filter((child) => nodeName(child) === name)
      .map((child) => new XmlElement(name, child));
  }

  child(name: string): XmlElement | undefined {
    return this.children(name)[0];
  }

  attribute(name: string): string | undefined {
    const attributes = this.node[ATTR_KEY];
    if (!isObjectNode(attributes)) {
      return undefined;
    }
    const value = attributes[name];
    return typeof value === 'string' ? value : undefined;
  }

  /**
   * All character content below the element in document order, untrimmed.
   * Markup inside the element is dropped and its text kept.
   */
  text(): string {
    return collectText(this.node);
  }
}

// =============================================================================
// Parsing
// =============================================================================

function createParser(): Parser {
  return new Parser({
    async: false,
    strict: true,
    explicitArray: true,
    explicitRoot: true,
    explicitChildren: true,
    preserveChildrenOrder: true,
    charsAsChildren: true,
    includeWhiteChars: true,
    attrkey: ATTR_KEY,
    charkey: TEXT_KEY,
    childkey: CHILDREN_KEY,
    trim: false,
    normalize: false,
  });
}

/**
 * Reject anything that is not a single well-formed element tree.
 */
function validateSyntax(xml: string): void {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(`Invalid XML syntax: ${msg} (line ${line}, column ${col})`);
  }
}

/**
 * Build a tree from XML text. Syntax failures surface as ParseError.
 */
export function parseXmlTree(xml: string): XmlDocument {
  validateSyntax(xml);

  const failures: unknown[] = [];
  let result: unknown;

  try {
    createParser().parseString(xml, (err: Error | null, parsed: unknown) => {
      if (err) {
        failures.push(err);
      } else if (result === undefined) {
        result = parsed;
      }
    });
  } catch (err) {
    failures.push(err);
  }

  const [failure] = failures;
  if (failure !== undefined) {
    throw new ParseError(`Invalid XML syntax: ${toErrorMessage(failure).trim()}`);
  }

  if (!isObjectNode(result)) {
    return { root: undefined };
  }

  const [rootName] = Object.keys(result);
  if (rootName === undefined) {
    return { root: undefined };
  }
  const rootNode = result[rootName];
  return { root: isObjectNode(rootNode) ? new XmlElement(rootName, rootNode) : undefined };
}
