/**
 * ComicInfo Core
 *
 * Parse, validate and serialize ComicInfo.xml metadata.
 *
 * This module is split into focused sub-modules:
 * - errors.ts: Error taxonomy
 * - enums.ts: Manga, AgeRating, BlackAndWhite, PageType value sets
 * - field-extraction.ts: Element/attribute getters and type coercion
 * - issue-fields.ts: Field table in schema order
 * - page.ts: Page record and <Pages> parsing
 * - issue.ts: Issue record and <ComicInfo> field extraction
 * - loader.ts: Text, file and URL entry points
 * - serializer.ts: XML and JSON output
 * - xml-tree.ts: Read-only view over the xml2js tree
 */

// =============================================================================
// Type Exports
// =============================================================================

export type { IssueFields, IssueInit, IssueJson, PageData, PageInit } from './types.js';
export type { ComicInfoErrorCode, ExpectedScalarType } from './errors.js';
export type { EnumCodec } from './enums.js';
export type { NumericRange } from './field-extraction.js';
export type { IssueFieldDescriptor, IssueFieldKind } from './issue-fields.js';
export type { JsonSerializeOptions, XmlSerializeOptions } from './serializer.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ComicInfoError,
  ComicInfoRangeError,
  FileError,
  InvalidEnumError,
  ParseError,
  SchemaError,
  TypeCoercionError,
  isComicInfoError,
  toErrorMessage,
} from './errors.js';

// =============================================================================
// Enumerations
// =============================================================================

export {
  AgeRating,
  AgeRatingCodec,
  BlackAndWhite,
  BlackAndWhiteCodec,
  Manga,
  MangaCodec,
  PageType,
  PageTypeCodec,
  isBlackAndWhiteValue,
  isCoverPageType,
  isMangaValue,
  isRightToLeftValue,
} from './enums.js';

// =============================================================================
// Records
// =============================================================================

export { Page, PAGE_DEFAULTS, parsePageBoolean } from './page.js';
export { Issue, formatComicDate, getDisplayTitle } from './issue.js';
export {
  COMICINFO_NAMESPACES,
  COMICINFO_ROOT_ELEMENT,
  COMMUNITY_RATING_RANGE,
  DAY_RANGE,
  ISSUE_FIELDS,
  MONTH_RANGE,
  YEAR_RANGE,
  formatDecimal,
} from './issue-fields.js';
export { joinCommaSeparated, splitCommaSeparated, splitWebUrls } from './multi-value.js';

// =============================================================================
// Loading & Serialization
// =============================================================================

export {
  loadComicInfo,
  loadComicInfoFromFile,
  loadComicInfoFromUrl,
  loadComicInfoFromUrlSync,
  loadComicInfoFromXml,
  looksLikeXml,
} from './loader.js';
export {
  buildComicInfoObject,
  deserializeIssueFromJson,
  serializeIssueToJson,
  serializeIssueToXml,
} from './serializer.js';
