/**
 * ComicInfo Serializer
 *
 * Renders an Issue back to ComicInfo.xml text with xml2js, and to/from its
 * JSON projection.
 */

import { Builder } from 'xml2js';
import { loadConfig } from '../config.service.js';
import { ParseError, toErrorMessage } from './errors.js';
import {
  COMICINFO_NAMESPACES,
  COMICINFO_ROOT_ELEMENT,
  ISSUE_FIELDS,
  PAGES_FOLLOW_ELEMENT,
} from './issue-fields.js';
import { Issue } from './issue.js';
import { PAGE_DEFAULTS, type Page } from './page.js';

// =============================================================================
// Types
// =============================================================================

export interface XmlSerializeOptions {
  /** Indent output (default: COMICINFO_PRETTY_XML, itself defaulting to true) */
  pretty?: boolean;
  /** Emit the `<?xml ...?>` declaration (default: true) */
  xmlDeclaration?: boolean;
}

export interface JsonSerializeOptions {
  /** Indentation width; omit for compact output */
  indent?: number;
}

type PageAttributes = Record<string, string>;

// =============================================================================
// XML
// =============================================================================

/**
 * Image and Type are always written; every other attribute only when it
 * differs from its default.
 */
function buildPageAttributes(page: Page): PageAttributes {
  const attributes: PageAttributes = {
    Image: String(page.image),
    Type: page.type,
  };
  if (page.doublePage) attributes.DoublePage = 'true';
  if (page.imageSize !== PAGE_DEFAULTS.imageSize) attributes.ImageSize = String(page.imageSize);
  if (page.key !== PAGE_DEFAULTS.key) attributes.Key = page.key;
  if (page.bookmark !== PAGE_DEFAULTS.bookmark) attributes.Bookmark = page.bookmark;
  if (page.imageWidth !== PAGE_DEFAULTS.imageWidth) attributes.ImageWidth = String(page.imageWidth);
  if (page.imageHeight !== PAGE_DEFAULTS.imageHeight) attributes.ImageHeight = String(page.imageHeight);
  return attributes;
}

/**
 * Object tree handed to the xml2js Builder, fields in schema order.
 * Absent fields produce no element.
 */
export function buildComicInfoObject(issue: Issue): Record<string, unknown> {
  const xmlObj: Record<string, unknown> = {
    $: { ...COMICINFO_NAMESPACES },
  };

  for (const descriptor of ISSUE_FIELDS) {
    const text = descriptor.format(issue);
    if (text !== undefined) {
      xmlObj[descriptor.element] = text;
    }
    if (descriptor.element === PAGES_FOLLOW_ELEMENT && issue.hasPages) {
      xmlObj.Pages = {
        Page: issue.pages.map((page) => ({ $: buildPageAttributes(page) })),
      };
    }
  }

  return xmlObj;
}

/**
 * Build ComicInfo.xml text from an Issue.
 */
export function serializeIssueToXml(issue: Issue, options: XmlSerializeOptions = {}): string {
  const pretty = options.pretty ?? loadConfig().prettyXml;

  const builder = new Builder({
    rootName: COMICINFO_ROOT_ELEMENT,
    headless: options.xmlDeclaration === false,
    xmldec: { version: '1.0', encoding: 'UTF-8' },
    renderOpts: pretty ? { pretty: true, indent: '  ', newline: '\n' } : { pretty: false },
  });

  try {
    return builder.buildObject(buildComicInfoObject(issue));
  } catch (err) {
    throw new ParseError(`Could not render ComicInfo XML: ${toErrorMessage(err)}`);
  }
}

// =============================================================================
// JSON
// =============================================================================

export function serializeIssueToJson(issue: Issue, options: JsonSerializeOptions = {}): string {
  return JSON.stringify(issue.toJSON(), null, options.indent);
}

/**
 * Parse JSON text produced by `serializeIssueToJson` back into an Issue.
 */
export function deserializeIssueFromJson(json: string): Issue {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new ParseError(`Invalid JSON: ${toErrorMessage(err)}`);
  }
  return Issue.fromJSON(value);
}
