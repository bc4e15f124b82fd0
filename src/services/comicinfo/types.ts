/**
 * ComicInfo Types
 *
 * Plain-data shapes of the Issue and Page records. These are what direct
 * construction accepts and what `toJSON()` produces.
 */

import type { AgeRating, BlackAndWhite, Manga, PageType } from './enums.js';

// =============================================================================
// Page
// =============================================================================

export interface PageData {
  /** 0-based image index within the archive */
  image: number;
  type: PageType;
  doublePage: boolean;
  /** Byte count, 0 when unknown */
  imageSize: number;
  key: string;
  bookmark: string;
  /** Pixels, -1 when unknown */
  imageWidth: number;
  /** Pixels, -1 when unknown */
  imageHeight: number;
}

/**
 * Only `image` is required; everything else takes its schema default.
 */
export type PageInit = Pick<PageData, 'image'> & Partial<Omit<PageData, 'image'>>;

// =============================================================================
// Issue
// =============================================================================

/**
 * Every stored scalar field of an Issue. All optional: absent is a valid
 * state and is distinct from an empty string or zero.
 */
export interface IssueFields {
  // Title Information
  title?: string;
  series?: string;
  number?: string;
  count?: number;
  volume?: number;
  alternateSeries?: string;
  alternateNumber?: string;
  alternateCount?: number;
  summary?: string;
  notes?: string;

  // Date Information
  year?: number;
  month?: number;
  day?: number;

  // Credits
  writer?: string;
  penciller?: string;
  inker?: string;
  colorist?: string;
  letterer?: string;
  coverArtist?: string;
  editor?: string;
  translator?: string;

  // Publishing
  publisher?: string;
  imprint?: string;
  /** Comma-separated genres */
  genreRawData?: string;
  /** Whitespace-separated URLs */
  webRawData?: string;
  pageCount?: number;
  languageISO?: string;
  format?: string;

  // Reading
  blackAndWhite?: BlackAndWhite;
  manga?: Manga;

  // Content
  /** Comma-separated character names */
  charactersRawData?: string;
  /** Comma-separated team names */
  teamsRawData?: string;
  /** Comma-separated locations */
  locationsRawData?: string;
  scanInformation?: string;
  /** Comma-separated story arc names */
  storyArc?: string;
  /** Comma-separated positions within the story arcs */
  storyArcNumber?: string;
  seriesGroup?: string;
  ageRating?: AgeRating;

  // Review
  communityRating?: number;
  mainCharacterOrTeam?: string;
  review?: string;
}

export interface IssueInit extends IssueFields {
  pages?: ReadonlyArray<PageInit>;
}

/**
 * JSON projection: stored fields (raw multi-value strings, never the derived
 * arrays) plus the page list. Absent fields are omitted.
 */
export interface IssueJson extends IssueFields {
  pages: PageData[];
}
