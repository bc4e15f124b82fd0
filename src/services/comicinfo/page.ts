/**
 * Page Record
 *
 * Metadata for one page image. Page fields are XML attributes on a
 * <Page> element inside <Pages>, unlike Issue fields which are elements.
 */

import { PageType, PageTypeCodec, isCoverPageType } from './enums.js';
import { SchemaError } from './errors.js';
import { coerceInteger, getAttribute, tryParseInteger, validateInteger } from './field-extraction.js';
import type { PageData, PageInit } from './types.js';
import type { XmlElement } from './xml-tree.js';

// =============================================================================
// Defaults
// =============================================================================

export const PAGE_DEFAULTS = Object.freeze({
  type: PageType.Story,
  doublePage: false,
  imageSize: 0,
  key: '',
  bookmark: '',
  imageWidth: -1,
  imageHeight: -1,
} satisfies Omit<PageData, 'image'>);

const TRUE_VALUES = new Set(['true', '1', 'yes']);

// =============================================================================
// Page Class
// =============================================================================

export class Page implements PageData {
  readonly image: number;
  readonly type: PageType;
  readonly doublePage: boolean;
  readonly imageSize: number;
  readonly key: string;
  readonly bookmark: string;
  readonly imageWidth: number;
  readonly imageHeight: number;

  constructor(init: PageInit) {
    this.image = validateInteger('Page.Image', init.image);
    this.type = PageTypeCodec.fromStringStrict(init.type ?? PAGE_DEFAULTS.type);
    this.doublePage = init.doublePage ?? PAGE_DEFAULTS.doublePage;
    this.imageSize = validateInteger('Page.ImageSize', init.imageSize ?? PAGE_DEFAULTS.imageSize);
    this.key = init.key ?? PAGE_DEFAULTS.key;
    this.bookmark = init.bookmark ?? PAGE_DEFAULTS.bookmark;
    this.imageWidth = validateInteger('Page.ImageWidth', init.imageWidth ?? PAGE_DEFAULTS.imageWidth);
    this.imageHeight = validateInteger('Page.ImageHeight', init.imageHeight ?? PAGE_DEFAULTS.imageHeight);
    Object.freeze(this);
  }

  get isCover(): boolean {
    return isCoverPageType(this.type);
  }

  get isStory(): boolean {
    return this.type === PageType.Story;
  }

  get isDeleted(): boolean {
    return this.type === PageType.Deleted;
  }

  get isDoublePage(): boolean {
    return this.doublePage;
  }

  /** Raw emptiness check, no trimming */
  get isBookmarked(): boolean {
    return this.bookmark !== '';
  }

  get dimensions(): { width?: number; height?: number } {
    return {
      width: this.imageWidth === -1 ? undefined : this.imageWidth,
      height: this.imageHeight === -1 ? undefined : this.imageHeight,
    };
  }

  get dimensionsAvailable(): boolean {
    return this.imageWidth !== -1 && this.imageHeight !== -1;
  }

  get aspectRatio(): number | undefined {
    if (!this.dimensionsAvailable || this.imageHeight === 0) {
      return undefined;
    }
    return this.imageWidth / this.imageHeight;
  }

  toJSON(): PageData {
    return {
      image: this.image,
      type: this.type,
      doublePage: this.doublePage,
      imageSize: this.imageSize,
      key: this.key,
      bookmark: this.bookmark,
      imageWidth: this.imageWidth,
      imageHeight: this.imageHeight,
    };
  }
}

// =============================================================================
// XML Parsing
// =============================================================================

/**
 * DoublePage accepts true/1/yes in any case; anything else is false.
 */
export function parsePageBoolean(value: string): boolean {
  return TRUE_VALUES.has(value.toLowerCase());
}

/**
 * Build a Page from a <Page> element. Image and Type are strict; DoublePage,
 * ImageSize, ImageWidth and ImageHeight fall back to their defaults on
 * unparseable input.
 */
export function parsePageElement(element: XmlElement): Page {
  const imageAttr = getAttribute(element, 'Image');
  if (imageAttr === undefined) {
    throw new SchemaError('Page element missing required Image attribute');
  }
  const image = coerceInteger('Page.Image', imageAttr);

  const type = PageTypeCodec.fromStringStrict(getAttribute(element, 'Type') ?? PAGE_DEFAULTS.type);
  const doublePage = parsePageBoolean(getAttribute(element, 'DoublePage') ?? 'false');
  const imageSize = tryParseInteger(getAttribute(element, 'ImageSize') ?? '0') ?? PAGE_DEFAULTS.imageSize;
  const key = getAttribute(element, 'Key') ?? PAGE_DEFAULTS.key;
  const bookmark = getAttribute(element, 'Bookmark') ?? PAGE_DEFAULTS.bookmark;
  const imageWidth = tryParseInteger(getAttribute(element, 'ImageWidth') ?? '-1') ?? PAGE_DEFAULTS.imageWidth;
  const imageHeight = tryParseInteger(getAttribute(element, 'ImageHeight') ?? '-1') ?? PAGE_DEFAULTS.imageHeight;

  return new Page({ image, type, doublePage, imageSize, key, bookmark, imageWidth, imageHeight });
}

/**
 * Pages in document order. A missing <Pages> element is an empty list.
 */
export function parsePagesElement(root: XmlElement): Page[] {
  const pagesElement = root.child('Pages');
  if (!pagesElement) {
    return [];
  }
  return pagesElement.children('Page').map(parsePageElement);
}
