/**
 * Issue Field Table
 *
 * One descriptor per scalar Issue field, in ComicInfo v2.0 schema order.
 * The loader, the Issue constructor and the XML serializer all walk this
 * table, so a field's element name, coercion and output form live in one
 * place.
 */

import { AgeRatingCodec, BlackAndWhiteCodec, MangaCodec } from './enums.js';
import {
  coerceDecimal,
  coerceInteger,
  normalizeString,
  range,
  validateDecimal,
  validateInteger,
  type NumericRange,
} from './field-extraction.js';
import type { IssueFields } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type IssueFieldKind = 'string' | 'integer' | 'decimal' | 'enum';

type KeysOfType<T, V> = {
  [K in keyof T]-?: [NonNullable<T[K]>] extends [V] ? ([V] extends [NonNullable<T[K]>] ? K : never) : never;
}[keyof T];

type StringFieldKey = KeysOfType<IssueFields, string>;
type NumberFieldKey = KeysOfType<IssueFields, number>;

export interface IssueFieldDescriptor {
  readonly key: keyof IssueFields;
  /** Child element name under <ComicInfo> */
  readonly element: string;
  readonly kind: IssueFieldKind;
  readonly range?: NumericRange;
  /** Coerce trimmed, non-empty element text and store it on target */
  decodeInto(target: IssueFields, raw: string): void;
  /** Validate a directly supplied value and store it on target when present */
  normalizeInto(target: IssueFields, source: IssueFields): void;
  /** Element text for XML output; undefined when the field is absent */
  format(source: IssueFields): string | undefined;
}

export const COMICINFO_ROOT_ELEMENT = 'ComicInfo';

export const COMICINFO_NAMESPACES = Object.freeze({
  'xmlns:xsd': 'http://www.w3.org/2001/XMLSchema',
  'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
});

export const YEAR_RANGE = range(1000, 9999);
export const MONTH_RANGE = range(1, 12);
export const DAY_RANGE = range(1, 31);
export const COMMUNITY_RATING_RANGE = range(0, 5, '0.0', '5.0');

// =============================================================================
// Descriptor Factories
// =============================================================================

function stringField(key: StringFieldKey, element: string): IssueFieldDescriptor {
  return {
    key,
    element,
    kind: 'string',
    decodeInto(target, raw) {
      target[key] = raw;
    },
    normalizeInto(target, source) {
      const value = normalizeString(source[key]);
      if (value !== undefined) target[key] = value;
    },
    format: (source) => source[key],
  };
}

function integerField(key: NumberFieldKey, element: string, bounds?: NumericRange): IssueFieldDescriptor {
  return {
    key,
    element,
    kind: 'integer',
    range: bounds,
    decodeInto(target, raw) {
      target[key] = coerceInteger(element, raw, bounds);
    },
    normalizeInto(target, source) {
      const value = source[key];
      if (value !== undefined) target[key] = validateInteger(element, value, bounds);
    },
    format(source) {
      const value = source[key];
      return value === undefined ? undefined : String(value);
    },
  };
}

function decimalField(key: NumberFieldKey, element: string, bounds?: NumericRange): IssueFieldDescriptor {
  return {
    key,
    element,
    kind: 'decimal',
    range: bounds,
    decodeInto(target, raw) {
      target[key] = coerceDecimal(element, raw, bounds);
    },
    normalizeInto(target, source) {
      const value = source[key];
      if (value !== undefined) target[key] = validateDecimal(element, value, bounds);
    },
    format(source) {
      const value = source[key];
      return value === undefined ? undefined : formatDecimal(value);
    },
  };
}

/**
 * Rewrite exponent notation ("1e-7", "1.5e+21") as plain digits.
 */
function expandExponent(text: string): string {
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Canonical decimal text: plain notation that always carries a fractional
 * part ("5.0", "4.25", "0.0000001").
 */
export function formatDecimal(value: number): string {
  const text = expandExponent(String(value));
  return text.includes('.') ? text : `${text}.0`;
}

// The three enum fields differ in value type, so each is spelled out.

const ageRatingField: IssueFieldDescriptor = {
  key: 'ageRating',
  element: 'AgeRating',
  kind: 'enum',
  decodeInto(target, raw) {
    target.ageRating = AgeRatingCodec.fromStringStrict(raw);
  },
  normalizeInto(target, source) {
    if (source.ageRating !== undefined) target.ageRating = AgeRatingCodec.fromStringStrict(source.ageRating);
  },
  format: (source) => source.ageRating,
};

const blackAndWhiteField: IssueFieldDescriptor = {
  key: 'blackAndWhite',
  element: 'BlackAndWhite',
  kind: 'enum',
  decodeInto(target, raw) {
    target.blackAndWhite = BlackAndWhiteCodec.fromStringStrict(raw);
  },
  normalizeInto(target, source) {
    if (source.blackAndWhite !== undefined) {
      target.blackAndWhite = BlackAndWhiteCodec.fromStringStrict(source.blackAndWhite);
    }
  },
  format: (source) => source.blackAndWhite,
};

const mangaField: IssueFieldDescriptor = {
  key: 'manga',
  element: 'Manga',
  kind: 'enum',
  decodeInto(target, raw) {
    target.manga = MangaCodec.fromStringStrict(raw);
  },
  normalizeInto(target, source) {
    if (source.manga !== undefined) target.manga = MangaCodec.fromStringStrict(source.manga);
  },
  format: (source) => source.manga,
};

// =============================================================================
// Field Table
// =============================================================================

export const ISSUE_FIELDS: readonly IssueFieldDescriptor[] = Object.freeze([
  stringField('title', 'Title'),
  stringField('series', 'Series'),
  stringField('number', 'Number'),
  integerField('count', 'Count'),
  integerField('volume', 'Volume'),
  stringField('alternateSeries', 'AlternateSeries'),
  stringField('alternateNumber', 'AlternateNumber'),
  integerField('alternateCount', 'AlternateCount'),
  stringField('summary', 'Summary'),
  stringField('notes', 'Notes'),
  integerField('year', 'Year', YEAR_RANGE),
  integerField('month', 'Month', MONTH_RANGE),
  integerField('day', 'Day', DAY_RANGE),
  stringField('writer', 'Writer'),
  stringField('penciller', 'Penciller'),
  stringField('inker', 'Inker'),
  stringField('colorist', 'Colorist'),
  stringField('letterer', 'Letterer'),
  stringField('coverArtist', 'CoverArtist'),
  stringField('editor', 'Editor'),
  stringField('translator', 'Translator'),
  stringField('publisher', 'Publisher'),
  stringField('imprint', 'Imprint'),
  stringField('genreRawData', 'Genre'),
  stringField('webRawData', 'Web'),
  integerField('pageCount', 'PageCount'),
  stringField('languageISO', 'LanguageISO'),
  stringField('format', 'Format'),
  blackAndWhiteField,
  mangaField,
  stringField('charactersRawData', 'Characters'),
  stringField('teamsRawData', 'Teams'),
  stringField('locationsRawData', 'Locations'),
  stringField('scanInformation', 'ScanInformation'),
  stringField('storyArc', 'StoryArc'),
  stringField('storyArcNumber', 'StoryArcNumber'),
  stringField('seriesGroup', 'SeriesGroup'),
  ageRatingField,
  decimalField('communityRating', 'CommunityRating', COMMUNITY_RATING_RANGE),
  stringField('mainCharacterOrTeam', 'MainCharacterOrTeam'),
  stringField('review', 'Review'),
]);

/** <Pages> is written directly after this element */
export const PAGES_FOLLOW_ELEMENT = 'AgeRating';

/**
 * Validate and normalize a set of field values: strings trimmed with blank
 * ones dropped, numbers checked against their type and range, enums checked
 * against their value set. Absent fields are left off the result.
 */
export function normalizeIssueFields(source: IssueFields): IssueFields {
  const fields: IssueFields = {};
  for (const descriptor of ISSUE_FIELDS) {
    descriptor.normalizeInto(fields, source);
  }
  return fields;
}
