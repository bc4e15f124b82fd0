/**
 * Issue Record
 *
 * Immutable value holding one comic book's ComicInfo metadata. Construct it
 * from named fields (every field optional) or through the loader; both paths
 * apply the same normalization and validation.
 */

import type { z } from 'zod';
import { type IssueJsonInput, type PageJsonInput, IssueJsonSchema } from '../../schemas/comicinfo.schemas.js';
import {
  type AgeRating,
  type BlackAndWhite,
  type EnumCodec,
  type Manga,
  AgeRatingCodec,
  BlackAndWhiteCodec,
  MangaCodec,
  PageTypeCodec,
  isBlackAndWhiteValue,
  isMangaValue,
  isRightToLeftValue,
} from './enums.js';
import { SchemaError } from './errors.js';
import { getElementText } from './field-extraction.js';
import { ISSUE_FIELDS, normalizeIssueFields } from './issue-fields.js';
import { splitCommaSeparated, splitWebUrls } from './multi-value.js';
import { Page, parsePagesElement } from './page.js';
import type { IssueFields, IssueInit, IssueJson, PageInit } from './types.js';
import type { XmlElement } from './xml-tree.js';

// =============================================================================
// Issue Class
// =============================================================================

export class Issue implements IssueFields {
  // Title Information
  readonly title?: string;
  readonly series?: string;
  readonly number?: string;
  readonly count?: number;
  readonly volume?: number;
  readonly alternateSeries?: string;
  readonly alternateNumber?: string;
  readonly alternateCount?: number;
  readonly summary?: string;
  readonly notes?: string;

  // Date Information
  readonly year?: number;
  readonly month?: number;
  readonly day?: number;

  // Credits
  readonly writer?: string;
  readonly penciller?: string;
  readonly inker?: string;
  readonly colorist?: string;
  readonly letterer?: string;
  readonly coverArtist?: string;
  readonly editor?: string;
  readonly translator?: string;

  // Publishing
  readonly publisher?: string;
  readonly imprint?: string;
  readonly genreRawData?: string;
  readonly webRawData?: string;
  readonly pageCount?: number;
  readonly languageISO?: string;
  readonly format?: string;

  // Reading
  readonly blackAndWhite?: BlackAndWhite;
  readonly manga?: Manga;

  // Content
  readonly charactersRawData?: string;
  readonly teamsRawData?: string;
  readonly locationsRawData?: string;
  readonly scanInformation?: string;
  readonly storyArc?: string;
  readonly storyArcNumber?: string;
  readonly seriesGroup?: string;
  readonly ageRating?: AgeRating;

  // Review
  readonly communityRating?: number;
  readonly mainCharacterOrTeam?: string;
  readonly review?: string;

  /** Reading order, as in the document */
  readonly pages: readonly Page[];

  constructor(init: IssueInit = {}) {
    const fields = normalizeIssueFields(init);

    this.title = fields.title;
    this.series = fields.series;
    this.number = fields.number;
    this.count = fields.count;
    this.volume = fields.volume;
    this.alternateSeries = fields.alternateSeries;
    this.alternateNumber = fields.alternateNumber;
    this.alternateCount = fields.alternateCount;
    this.summary = fields.summary;
    this.notes = fields.notes;
    this.year = fields.year;
    this.month = fields.month;
    this.day = fields.day;
    this.writer = fields.writer;
    this.penciller = fields.penciller;
    this.inker = fields.inker;
    this.colorist = fields.colorist;
    this.letterer = fields.letterer;
    this.coverArtist = fields.coverArtist;
    this.editor = fields.editor;
    this.translator = fields.translator;
    this.publisher = fields.publisher;
    this.imprint = fields.imprint;
    this.genreRawData = fields.genreRawData;
    this.webRawData = fields.webRawData;
    this.pageCount = fields.pageCount;
    this.languageISO = fields.languageISO;
    this.format = fields.format;
    this.blackAndWhite = fields.blackAndWhite;
    this.manga = fields.manga;
    this.charactersRawData = fields.charactersRawData;
    this.teamsRawData = fields.teamsRawData;
    this.locationsRawData = fields.locationsRawData;
    this.scanInformation = fields.scanInformation;
    this.storyArc = fields.storyArc;
    this.storyArcNumber = fields.storyArcNumber;
    this.seriesGroup = fields.seriesGroup;
    this.ageRating = fields.ageRating;
    this.communityRating = fields.communityRating;
    this.mainCharacterOrTeam = fields.mainCharacterOrTeam;
    this.review = fields.review;

    this.pages = Object.freeze((init.pages ?? []).map((page) => (page instanceof Page ? page : new Page(page))));
    Object.freeze(this);
  }

  // ===========================================================================
  // Multi-value Views
  // ===========================================================================

  get characters(): string[] {
    return splitCommaSeparated(this.charactersRawData);
  }

  get teams(): string[] {
    return splitCommaSeparated(this.teamsRawData);
  }

  get locations(): string[] {
    return splitCommaSeparated(this.locationsRawData);
  }

  get genres(): string[] {
    return splitCommaSeparated(this.genreRawData);
  }

  get storyArcs(): string[] {
    return splitCommaSeparated(this.storyArc);
  }

  get storyArcNumbers(): string[] {
    return splitCommaSeparated(this.storyArcNumber);
  }

  get webUrls(): URL[] {
    return splitWebUrls(this.webRawData);
  }

  // ===========================================================================
  // Pages
  // ===========================================================================

  get hasPages(): boolean {
    return this.pages.length > 0;
  }

  get coverPages(): Page[] {
    return this.pages.filter((page) => page.isCover);
  }

  get storyPages(): Page[] {
    return this.pages.filter((page) => page.isStory);
  }

  // ===========================================================================
  // Flags & Dates
  // ===========================================================================

  get isManga(): boolean {
    return this.manga !== undefined && isMangaValue(this.manga);
  }

  get isRightToLeft(): boolean {
    return this.manga !== undefined && isRightToLeftValue(this.manga);
  }

  get isBlackAndWhite(): boolean {
    return this.blackAndWhite !== undefined && isBlackAndWhiteValue(this.blackAndWhite);
  }

  /**
   * Midnight UTC on the publication day. Month and day default to 1.
   * Out-of-month days roll over (Feb 31 becomes early March).
   */
  get publicationDate(): Date | undefined {
    if (this.year === undefined || this.year <= 0) {
      return undefined;
    }
    const date = new Date(0);
    date.setUTCFullYear(this.year, (this.month ?? 1) - 1, this.day ?? 1);
    return date;
  }

  /** `YYYY`, `YYYY-MM` or `YYYY-MM-DD`, depending on what is set */
  get dateString(): string | undefined {
    return formatComicDate(this.year, this.month, this.day) ?? undefined;
  }

  get displayTitle(): string {
    return getDisplayTitle(this);
  }

  // ===========================================================================
  // JSON
  // ===========================================================================

  toJSON(): IssueJson {
    return {
      ...normalizeIssueFields(this),
      pages: this.pages.map((page) => page.toJSON()),
    };
  }

  /**
   * Rebuild an Issue from its JSON projection. Shape problems are a
   * SchemaError; value problems keep their own error kind. Enum values are
   * checked before the remaining fields.
   */
  static fromJSON(value: unknown): Issue {
    const result = IssueJsonSchema.safeParse(value);
    if (!result.success) {
      throw new SchemaError(describeSchemaIssues(result.error));
    }
    return new Issue(decodeIssueJson(result.data));
  }
}

function decodeEnum<T extends string>(codec: EnumCodec<T>, value: string | undefined): T | undefined {
  return value === undefined ? undefined : codec.fromStringStrict(value);
}

function decodePageJson({ type, ...page }: PageJsonInput): PageInit {
  return { ...page, type: decodeEnum(PageTypeCodec, type) };
}

function decodeIssueJson({ blackAndWhite, manga, ageRating, pages, ...fields }: IssueJsonInput): IssueInit {
  return {
    ...fields,
    blackAndWhite: decodeEnum(BlackAndWhiteCodec, blackAndWhite),
    manga: decodeEnum(MangaCodec, manga),
    ageRating: decodeEnum(AgeRatingCodec, ageRating),
    pages: pages?.map(decodePageJson),
  };
}

function describeSchemaIssues(error: z.ZodError): string {
  const [first] = error.issues;
  if (!first) return 'Invalid issue JSON';
  const path = first.path.map(String).join('.');
  return path ? `Invalid issue JSON at '${path}': ${first.message}` : `Invalid issue JSON: ${first.message}`;
}

// =============================================================================
// XML Extraction
// =============================================================================

/**
 * Read every scalar field and the page list from a <ComicInfo> element.
 * The first invalid field aborts the whole read.
 */
export function readIssueFromElement(root: XmlElement): Issue {
  const fields: IssueFields = {};
  for (const descriptor of ISSUE_FIELDS) {
    const raw = getElementText(root, descriptor.element);
    if (raw !== undefined) {
      descriptor.decodeInto(fields, raw);
    }
  }
  const pages = parsePagesElement(root);
  return new Issue({ ...fields, pages });
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Format a date from Year, Month, Day fields.
 */
export function formatComicDate(
  year?: number,
  month?: number,
  day?: number
): string | null {
  if (!year) return null;

  let dateStr = year.toString();
  if (month) {
    dateStr += `-${month.toString().padStart(2, '0')}`;
    if (day) {
      dateStr += `-${day.toString().padStart(2, '0')}`;
    }
  }
  return dateStr;
}

/**
 * Get display title from an issue's fields.
 */
export function getDisplayTitle(fields: Pick<IssueFields, 'title' | 'series' | 'number'>): string {
  if (fields.title) return fields.title;
  if (fields.series && fields.number) {
    return `${fields.series} #${fields.number}`;
  }
  if (fields.series) return fields.series;
  return 'Unknown';
}
