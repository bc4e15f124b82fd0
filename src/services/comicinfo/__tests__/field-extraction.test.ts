/**
 * Field Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { MangaCodec } from '../enums.js';
import { ComicInfoRangeError, InvalidEnumError, TypeCoercionError } from '../errors.js';
import {
  coerceDecimal,
  coerceInteger,
  getAttribute,
  getElementText,
  normalizeString,
  range,
  readDecimal,
  readEnum,
  readInteger,
  tryParseDecimal,
  tryParseInteger,
  validateDecimal,
  validateInteger,
} from '../field-extraction.js';
import { parseXmlTree, type XmlElement } from '../xml-tree.js';

function rootOf(xml: string): XmlElement {
  const { root } = parseXmlTree(xml);
  if (!root) throw new Error('fixture has no root');
  return root;
}

describe('Field Extraction', () => {
  // ===========================================================================
  // Getters
  // ===========================================================================

  describe('getElementText', () => {
    it('should trim element text', () => {
      expect(getElementText(rootOf('<R><A>  hello  </A></R>'), 'A')).toBe('hello');
    });

    it('should treat missing, empty and blank elements as absent', () => {
      const root = rootOf('<R><B/><C>   </C></R>');
      expect(getElementText(root, 'A')).toBeUndefined();
      expect(getElementText(root, 'B')).toBeUndefined();
      expect(getElementText(root, 'C')).toBeUndefined();
    });

    it('should use the first of repeated elements', () => {
      expect(getElementText(rootOf('<R><A>first</A><A>second</A></R>'), 'A')).toBe('first');
    });

    it('should not read attributes as elements', () => {
      expect(getElementText(rootOf('<R A="attr"/>'), 'A')).toBeUndefined();
    });
  });

  describe('getAttribute', () => {
    it('should return attribute values verbatim', () => {
      const page = rootOf('<Page Key=" spaced " Image="3"/>');
      expect(getAttribute(page, 'Key')).toBe(' spaced ');
      expect(getAttribute(page, 'Image')).toBe('3');
      expect(getAttribute(page, 'Type')).toBeUndefined();
    });

    it('should not read child elements as attributes', () => {
      expect(getAttribute(rootOf('<Page><Image>3</Image></Page>'), 'Image')).toBeUndefined();
    });
  });

  // ===========================================================================
  // Coercion
  // ===========================================================================

  describe('normalizeString', () => {
    it('should trim and drop blank values', () => {
      expect(normalizeString('  x ')).toBe('x');
      expect(normalizeString(' \n\t ')).toBeUndefined();
      expect(normalizeString(null)).toBeUndefined();
      expect(normalizeString(undefined)).toBeUndefined();
    });
  });

  describe('tryParseInteger', () => {
    it('should parse signed base-10 integers', () => {
      expect(tryParseInteger('42')).toBe(42);
      expect(tryParseInteger('-7')).toBe(-7);
      expect(tryParseInteger('+3')).toBe(3);
      expect(tryParseInteger('007')).toBe(7);
    });

    it('should reject anything else', () => {
      expect(tryParseInteger('4.0')).toBeUndefined();
      expect(tryParseInteger('1e3')).toBeUndefined();
      expect(tryParseInteger('0x10')).toBeUndefined();
      expect(tryParseInteger('12abc')).toBeUndefined();
      expect(tryParseInteger('')).toBeUndefined();
      expect(tryParseInteger('99999999999999999999')).toBeUndefined();
    });
  });

  describe('tryParseDecimal', () => {
    it('should parse decimal notation', () => {
      expect(tryParseDecimal('4.5')).toBe(4.5);
      expect(tryParseDecimal('5')).toBe(5);
      expect(tryParseDecimal('.5')).toBe(0.5);
      expect(tryParseDecimal('-0.1')).toBe(-0.1);
      expect(tryParseDecimal('2.5e0')).toBe(2.5);
    });

    it('should reject non-numeric text', () => {
      expect(tryParseDecimal('great')).toBeUndefined();
      expect(tryParseDecimal('4,5')).toBeUndefined();
      expect(tryParseDecimal('Infinity')).toBeUndefined();
      expect(tryParseDecimal('NaN')).toBeUndefined();
    });
  });

  describe('coerceInteger', () => {
    const bounds = range(1, 12);

    it('should return values inside the range', () => {
      expect(coerceInteger('Month', '1', bounds)).toBe(1);
      expect(coerceInteger('Month', '12', bounds)).toBe(12);
    });

    it('should check type before range', () => {
      expect(() => coerceInteger('Month', 'June', bounds)).toThrow(TypeCoercionError);
      expect(() => coerceInteger('Month', '13', bounds)).toThrow(
        "Value '13' for field 'Month' is out of range (1..12)"
      );
    });

    it('should accept any integer without bounds', () => {
      expect(coerceInteger('Count', '-5')).toBe(-5);
    });
  });

  describe('coerceDecimal', () => {
    const bounds = range(0, 5, '0.0', '5.0');

    it('should report bounds with their labels', () => {
      expect(() => coerceDecimal('CommunityRating', '5.1', bounds)).toThrow(
        "Value '5.1' for field 'CommunityRating' is out of range (0.0..5.0)"
      );
    });

    it('should report the expected type', () => {
      expect(() => coerceDecimal('CommunityRating', 'great', bounds)).toThrow(
        "Cannot convert value 'great' for field 'CommunityRating' to Double"
      );
    });
  });

  describe('validateInteger / validateDecimal', () => {
    it('should reject non-integer numbers', () => {
      expect(() => validateInteger('Count', 1.5)).toThrow(
        "Cannot convert value '1.5' for field 'Count' to Int"
      );
    });

    it('should reject non-finite decimals', () => {
      expect(() => validateDecimal('CommunityRating', Number.NaN)).toThrow(TypeCoercionError);
    });

    it('should range-check supplied numbers', () => {
      expect(() => validateInteger('Year', 999, range(1000, 9999))).toThrow(ComicInfoRangeError);
      expect(validateDecimal('CommunityRating', 0, range(0, 5))).toBe(0);
    });
  });

  // ===========================================================================
  // Element Readers
  // ===========================================================================

  describe('element readers', () => {
    const root = rootOf('<R><Year> 2020 </Year><Rating>3.25</Rating><Manga>No</Manga><Bad>Nope</Bad></R>');

    it('should coerce trimmed element text', () => {
      expect(readInteger(root, 'Year', range(1000, 9999))).toBe(2020);
      expect(readDecimal(root, 'Rating')).toBe(3.25);
      expect(readEnum(root, 'Manga', MangaCodec)).toBe('No');
    });

    it('should leave missing elements absent', () => {
      expect(readInteger(root, 'Month')).toBeUndefined();
      expect(readEnum(root, 'AgeRating', MangaCodec)).toBeUndefined();
    });

    it('should apply the strict enum parser', () => {
      expect(() => readEnum(root, 'Bad', MangaCodec)).toThrow(InvalidEnumError);
    });
  });
});
