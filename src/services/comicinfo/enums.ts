/**
 * ComicInfo Enumerations
 *
 * Closed value sets of the ComicInfo schema. Each set is a const object of
 * symbolic name -> canonical XML string, a union type of the canonical
 * strings, and a codec with a lenient and a strict parser.
 */

import { InvalidEnumError } from './errors.js';

// =============================================================================
// Codec
// =============================================================================

export interface EnumCodec<T extends string> {
  /** Field name reported in InvalidEnumError */
  readonly field: string;
  /** Canonical strings in declaration order */
  readonly values: readonly T[];
  /** Value returned by the lenient parser for empty or unknown input */
  readonly fallback: T;
  is(value: string): value is T;
  /** Never fails: empty, absent or unknown input yields the fallback */
  fromStringLenient(value: string | null | undefined): T;
  /** Exact, case-sensitive match or InvalidEnumError */
  fromStringStrict(value: string): T;
}

function createEnumCodec<T extends string>(
  field: string,
  members: Readonly<Record<string, T>>,
  fallback: T
): EnumCodec<T> {
  const values: readonly T[] = Object.freeze(Object.values(members));
  const lookup = new Set<string>(values);

  const is = (value: string): value is T => lookup.has(value);

  return Object.freeze({
    field,
    values,
    fallback,
    is,
    fromStringLenient(value: string | null | undefined): T {
      if (!value) return fallback;
      return is(value) ? value : fallback;
    },
    fromStringStrict(value: string): T {
      if (!is(value)) {
        throw new InvalidEnumError(field, value, [...values]);
      }
      return value;
    },
  });
}

// =============================================================================
// Manga
// =============================================================================

export const Manga = {
  Unknown: 'Unknown',
  No: 'No',
  Yes: 'Yes',
  YesAndRightToLeft: 'YesAndRightToLeft',
} as const;

export type Manga = (typeof Manga)[keyof typeof Manga];

export const MangaCodec = createEnumCodec<Manga>('Manga', Manga, Manga.Unknown);

export function isMangaValue(value: Manga): boolean {
  return value === Manga.Yes || value === Manga.YesAndRightToLeft;
}

export function isRightToLeftValue(value: Manga): boolean {
  return value === Manga.YesAndRightToLeft;
}

// =============================================================================
// AgeRating
// =============================================================================

export const AgeRating = {
  Unknown: 'Unknown',
  AdultsOnly18Plus: 'Adults Only 18+',
  EarlyChildhood: 'Early Childhood',
  Everyone: 'Everyone',
  Everyone10Plus: 'Everyone 10+',
  G: 'G',
  KidsToAdults: 'Kids to Adults',
  M: 'M',
  MA15Plus: 'MA15+',
  Mature17Plus: 'Mature 17+',
  PG: 'PG',
  R18Plus: 'R18+',
  RatingPending: 'Rating Pending',
  Teen: 'Teen',
  X18Plus: 'X18+',
} as const;

export type AgeRating = (typeof AgeRating)[keyof typeof AgeRating];

export const AgeRatingCodec = createEnumCodec<AgeRating>('AgeRating', AgeRating, AgeRating.Unknown);

// =============================================================================
// BlackAndWhite
// =============================================================================

export const BlackAndWhite = {
  Unknown: 'Unknown',
  No: 'No',
  Yes: 'Yes',
} as const;

export type BlackAndWhite = (typeof BlackAndWhite)[keyof typeof BlackAndWhite];

export const BlackAndWhiteCodec = createEnumCodec<BlackAndWhite>(
  'BlackAndWhite',
  BlackAndWhite,
  BlackAndWhite.Unknown
);

export function isBlackAndWhiteValue(value: BlackAndWhite): boolean {
  return value === BlackAndWhite.Yes;
}

// =============================================================================
// PageType
// =============================================================================

export const PageType = {
  FrontCover: 'FrontCover',
  InnerCover: 'InnerCover',
  Roundup: 'Roundup',
  Story: 'Story',
  Advertisement: 'Advertisement',
  Editorial: 'Editorial',
  Letters: 'Letters',
  Preview: 'Preview',
  BackCover: 'BackCover',
  Other: 'Other',
  Deleted: 'Deleted',
} as const;

export type PageType = (typeof PageType)[keyof typeof PageType];

export const PageTypeCodec = createEnumCodec<PageType>('PageType', PageType, PageType.Story);

const COVER_PAGE_TYPES: ReadonlySet<PageType> = new Set([
  PageType.FrontCover,
  PageType.InnerCover,
  PageType.BackCover,
]);

export function isCoverPageType(type: PageType): boolean {
  return COVER_PAGE_TYPES.has(type);
}
