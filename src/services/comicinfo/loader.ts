/**
 * ComicInfo Loader
 *
 * Entry points that turn XML text, a file path or a URL into an Issue.
 * Loading from text is synchronous: empty check, tree build, root check,
 * field extraction. The first error anywhere aborts the load.
 */

import { existsSync, readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { loadConfig } from '../config.service.js';
import { createServiceLogger } from '../logger.service.js';
import { FileError, ParseError, isComicInfoError, toErrorMessage } from './errors.js';
import { COMICINFO_ROOT_ELEMENT } from './issue-fields.js';
import { type Issue, readIssueFromElement } from './issue.js';
import { parseXmlTree } from './xml-tree.js';

const logger = createServiceLogger('comicinfo');

// =============================================================================
// XML Text
// =============================================================================

/** Where the XML text came from, for log context */
type LoadSource = 'xml' | 'file' | 'url';

function parseComicInfo(xml: string, source: LoadSource): Issue {
  if (xml.trim() === '') {
    throw new ParseError('XML string cannot be nil or empty');
  }

  logger.debug({ source, length: xml.length }, 'Parsing ComicInfo XML');
  const document = parseXmlTree(xml);

  const root = document.root;
  if (!root) {
    throw new ParseError('No root element found');
  }
  if (root.name !== COMICINFO_ROOT_ELEMENT) {
    throw new ParseError(`No ComicInfo root element found (found '${root.name}')`);
  }
  logger.debug({ root: root.name }, 'Root element validated');

  const issue = readIssueFromElement(root);
  logger.debug(
    { series: issue.series, number: issue.number, pages: issue.pages.length },
    'Parse successful'
  );
  return issue;
}

/**
 * Load an Issue from ComicInfo.xml text.
 */
export function loadComicInfoFromXml(xml: string): Issue {
  return parseComicInfo(xml, 'xml');
}

// =============================================================================
// File Paths
// =============================================================================

/**
 * Content beginning with "<" after trimming is XML, anything else a path.
 */
export function looksLikeXml(input: string): boolean {
  return input.trim().startsWith('<');
}

/**
 * Reject inputs that are neither XML nor plausibly a path: all digits, or
 * without any dot or path separator.
 */
function validateFilePath(input: string): void {
  if (/^\d+$/.test(input) || (!input.includes('.') && !input.includes('/') && !input.includes('\\'))) {
    throw new ParseError(`Input '${input}' does not appear to be valid XML or a file path`);
  }
}

/**
 * Load from an explicit file path.
 */
export function loadComicInfoFromFile(filePath: string): Issue {
  validateFilePath(filePath);

  if (!existsSync(filePath)) {
    throw new FileError(`File does not exist: '${filePath}'`);
  }

  let xml: string;
  try {
    xml = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new FileError(`Failed to read file '${filePath}': ${toErrorMessage(err)}`);
  }
  logger.debug({ filePath, size: xml.length }, 'Read ComicInfo file');
  return parseComicInfo(xml, 'file');
}

/**
 * Load from XML text or a file path, whichever the input looks like.
 */
export function loadComicInfo(input: string): Issue {
  if (input === '') {
    throw new ParseError('Input cannot be nil or empty');
  }
  return looksLikeXml(input) ? loadComicInfoFromXml(input) : loadComicInfoFromFile(input);
}

// =============================================================================
// URLs
// =============================================================================

function toUrl(url: URL | string): URL {
  if (url instanceof URL) return url;
  if (!URL.canParse(url)) {
    throw new FileError(`Invalid URL '${url}'`);
  }
  return new URL(url);
}

/**
 * Re-throw library errors as they are; wrap everything else as FileError.
 */
function wrapIoError(err: unknown, message: string): never {
  if (isComicInfoError(err)) {
    throw err;
  }
  throw new FileError(`${message}: ${toErrorMessage(err)}`);
}

/**
 * Synchronous URL loading. Only `file:` URLs can be read without suspending.
 */
export function loadComicInfoFromUrlSync(url: URL | string): Issue {
  const target = toUrl(url);
  if (target.protocol !== 'file:') {
    throw new FileError(`Synchronous loading supports only file: URLs, got '${target.href}'`);
  }

  try {
    const xml = readFileSync(fileURLToPath(target), 'utf-8');
    return parseComicInfo(xml, 'url');
  } catch (err) {
    return wrapIoError(err, `Failed to read from URL '${target.href}'`);
  }
}

async function fetchText(target: URL): Promise<string> {
  const { fetchTimeoutMs, userAgent } = loadConfig();

  const response = await fetch(target, {
    headers: {
      'User-Agent': userAgent,
      Accept: 'application/xml, text/xml;q=0.9, */*;q=0.8',
    },
    redirect: 'follow',
    signal: AbortSignal.timeout(fetchTimeoutMs),
  });

  if (!response.ok) {
    throw new FileError(`HTTP ${response.status}: ${response.statusText}`);
  }

  const bytes = new Uint8Array(await response.arrayBuffer());
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new ParseError(`Could not decode data from URL '${target.href}' as UTF-8`);
  }
}

/**
 * Asynchronous URL loading: `file:`, `http:` and `https:`.
 * The only suspension point is retrieval; parsing runs after the bytes arrive.
 */
export async function loadComicInfoFromUrl(url: URL | string): Promise<Issue> {
  const target = toUrl(url);
  logger.debug({ url: target.href }, 'Loading ComicInfo from URL');

  let xml: string;
  try {
    switch (target.protocol) {
      case 'file:':
        xml = await readFile(fileURLToPath(target), 'utf-8');
        break;
      case 'http:':
      case 'https:':
        xml = await fetchText(target);
        break;
      default:
        throw new FileError(`Unsupported URL scheme '${target.protocol}'`);
    }
  } catch (err) {
    return wrapIoError(err, `Failed to load from URL '${target.href}'`);
  }

  return parseComicInfo(xml, 'url');
}
