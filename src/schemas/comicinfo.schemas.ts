/**
 * ComicInfo Validation Schemas
 *
 * Zod schemas for the JSON projection of an Issue. They check shape only.
 * Enum value sets, numeric ranges and integer-ness are enforced by the enum
 * codecs and the Issue and Page constructors, so those failures keep their
 * own error kinds.
 */

import { z } from 'zod';

// =============================================================================
// Page Schema
// =============================================================================

export const PageJsonSchema = z.object({
  image: z.number(),
  type: z.string().optional(),
  doublePage: z.boolean().optional(),
  imageSize: z.number().optional(),
  key: z.string().optional(),
  bookmark: z.string().optional(),
  imageWidth: z.number().optional(),
  imageHeight: z.number().optional(),
});

// =============================================================================
// Issue Schema
// =============================================================================

const optionalString = z.string().optional();
const optionalNumber = z.number().optional();

export const IssueJsonSchema = z.object({
  // Title Information
  title: optionalString,
  series: optionalString,
  number: optionalString,
  count: optionalNumber,
  volume: optionalNumber,
  alternateSeries: optionalString,
  alternateNumber: optionalString,
  alternateCount: optionalNumber,
  summary: optionalString,
  notes: optionalString,

  // Date Information
  year: optionalNumber,
  month: optionalNumber,
  day: optionalNumber,

  // Credits
  writer: optionalString,
  penciller: optionalString,
  inker: optionalString,
  colorist: optionalString,
  letterer: optionalString,
  coverArtist: optionalString,
  editor: optionalString,
  translator: optionalString,

  // Publishing
  publisher: optionalString,
  imprint: optionalString,
  genreRawData: optionalString,
  webRawData: optionalString,
  pageCount: optionalNumber,
  languageISO: optionalString,
  format: optionalString,

  // Reading
  blackAndWhite: optionalString,
  manga: optionalString,

  // Content
  charactersRawData: optionalString,
  teamsRawData: optionalString,
  locationsRawData: optionalString,
  scanInformation: optionalString,
  storyArc: optionalString,
  storyArcNumber: optionalString,
  seriesGroup: optionalString,
  ageRating: optionalString,

  // Review
  communityRating: optionalNumber,
  mainCharacterOrTeam: optionalString,
  review: optionalString,

  pages: z.array(PageJsonSchema).optional(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type PageJsonInput = z.infer<typeof PageJsonSchema>;
export type IssueJsonInput = z.infer<typeof IssueJsonSchema>;
