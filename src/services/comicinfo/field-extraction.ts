/**
 * Field Extraction & Coercion
 *
 * Issue fields are child elements; Page fields are attributes, each read
 * through its own getter. The coercion helpers serve both the XML loader
 * and direct construction.
 */

import { ComicInfoRangeError, TypeCoercionError } from './errors.js';
import type { EnumCodec } from './enums.js';
import type { XmlElement } from './xml-tree.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Closed numeric interval. Bounds keep the text they are reported with.
 */
export interface NumericRange {
  min: number;
  max: number;
  minLabel: string;
  maxLabel: string;
}

export function range(min: number, max: number, minLabel = String(min), maxLabel = String(max)): NumericRange {
  return { min, max, minLabel, maxLabel };
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// =============================================================================
// Getters
// =============================================================================

/**
 * Text of the first child element with this name, trimmed.
 * A missing element and a blank one are both absent.
 */
export function getElementText(parent: XmlElement, name: string): string | undefined {
  const element = parent.child(name);
  if (!element) return undefined;
  return normalizeString(element.text());
}

/**
 * Raw attribute value. No trimming: Page attributes are read verbatim.
 */
export function getAttribute(element: XmlElement, name: string): string | undefined {
  return element.attribute(name);
}

// =============================================================================
// Coercion
// =============================================================================

/**
 * Trim, and treat empty or whitespace-only text as absent.
 */
export function normalizeString(value: string | null | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Base-10 integer, optional sign, nothing else. Undefined when unparseable.
 */
export function tryParseInteger(raw: string): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function tryParseDecimal(raw: string): number | undefined {
  if (!DECIMAL_PATTERN.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function checkRange(field: string, raw: string, value: number, bounds: NumericRange): number {
  if (value < bounds.min || value > bounds.max) {
    throw new ComicInfoRangeError(field, raw, bounds.minLabel, bounds.maxLabel);
  }
  return value;
}

export function coerceInteger(field: string, raw: string, bounds?: NumericRange): number {
  const value = tryParseInteger(raw);
  if (value === undefined) {
    throw new TypeCoercionError(field, raw, 'Int');
  }
  return bounds ? checkRange(field, raw, value, bounds) : value;
}

export function coerceDecimal(field: string, raw: string, bounds?: NumericRange): number {
  const value = tryParseDecimal(raw);
  if (value === undefined) {
    throw new TypeCoercionError(field, raw, 'Double');
  }
  return bounds ? checkRange(field, raw, value, bounds) : value;
}

/**
 * Validate a number that did not come from text (direct construction, JSON).
 */
export function validateInteger(field: string, value: number, bounds?: NumericRange): number {
  if (!Number.isSafeInteger(value)) {
    throw new TypeCoercionError(field, String(value), 'Int');
  }
  return bounds ? checkRange(field, String(value), value, bounds) : value;
}

export function validateDecimal(field: string, value: number, bounds?: NumericRange): number {
  if (!Number.isFinite(value)) {
    throw new TypeCoercionError(field, String(value), 'Double');
  }
  return bounds ? checkRange(field, String(value), value, bounds) : value;
}

// =============================================================================
// Element Readers
// =============================================================================

export function readInteger(parent: XmlElement, name: string, bounds?: NumericRange): number | undefined {
  const raw = getElementText(parent, name);
  return raw === undefined ? undefined : coerceInteger(name, raw, bounds);
}

export function readDecimal(parent: XmlElement, name: string, bounds?: NumericRange): number | undefined {
  const raw = getElementText(parent, name);
  return raw === undefined ? undefined : coerceDecimal(name, raw, bounds);
}

export function readEnum<T extends string>(parent: XmlElement, name: string, codec: EnumCodec<T>): T | undefined {
  const raw = getElementText(parent, name);
  return raw === undefined ? undefined : codec.fromStringStrict(raw);
}
