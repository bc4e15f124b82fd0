/**
 * ComicInfo Serializer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { clearConfigCache } from '../../config.service.js';
import { AgeRating, PageType } from '../enums.js';
import { ParseError, SchemaError } from '../errors.js';
import { Issue } from '../issue.js';
import { formatDecimal } from '../issue-fields.js';
import { loadComicInfoFromXml } from '../loader.js';
import {
  buildComicInfoObject,
  deserializeIssueFromJson,
  serializeIssueToJson,
  serializeIssueToXml,
} from '../serializer.js';
import { COMPLETE_COMICINFO_XML, MINIMAL_COMICINFO_XML } from './__fixtures__/comicinfo.fixtures.js';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const ROOT_OPEN =
  '<ComicInfo xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">';

describe('ComicInfo Serializer', () => {
  beforeEach(() => {
    delete process.env.COMICINFO_PRETTY_XML;
    clearConfigCache();
  });

  afterEach(() => {
    delete process.env.COMICINFO_PRETTY_XML;
    clearConfigCache();
  });

  // ===========================================================================
  // XML Output
  // ===========================================================================

  describe('serializeIssueToXml', () => {
    it('should write fields in schema order with pages after AgeRating', () => {
      const issue = new Issue({
        communityRating: 4,
        series: 'Test Series',
        year: 2024,
        number: '1',
        ageRating: AgeRating.Teen,
        pages: [{ image: 0, type: PageType.FrontCover }, { image: 1 }],
      });

      expect(serializeIssueToXml(issue).split('\n')).toEqual([
        DECLARATION,
        ROOT_OPEN,
        '  <Series>Test Series</Series>',
        '  <Number>1</Number>',
        '  <Year>2024</Year>',
        '  <AgeRating>Teen</AgeRating>',
        '  <Pages>',
        '    <Page Image="0" Type="FrontCover"/>',
        '    <Page Image="1" Type="Story"/>',
        '  </Pages>',
        '  <CommunityRating>4.0</CommunityRating>',
        '</ComicInfo>',
      ]);
    });

    it('should write non-default page attributes only', () => {
      const issue = new Issue({
        pages: [
          {
            image: 2,
            type: PageType.Letters,
            doublePage: true,
            imageSize: 2048,
            key: 'k2',
            bookmark: 'Mail',
            imageWidth: 800,
            imageHeight: 1200,
          },
        ],
      });

      expect(serializeIssueToXml(issue, { xmlDeclaration: false }).split('\n')).toEqual([
        ROOT_OPEN,
        '  <Pages>',
        '    <Page Image="2" Type="Letters" DoublePage="true" ImageSize="2048" Key="k2" Bookmark="Mail" ImageWidth="800" ImageHeight="1200"/>',
        '  </Pages>',
        '</ComicInfo>',
      ]);
    });

    it('should escape markup in text', () => {
      const xml = serializeIssueToXml(new Issue({ title: 'Cats & Dogs <Special>' }), { xmlDeclaration: false });
      expect(xml.split('\n')[1]).toBe('  <Title>Cats &amp; Dogs &lt;Special&gt;</Title>');
    });

    it('should write raw multi-value strings unchanged', () => {
      const xml = serializeIssueToXml(new Issue({ charactersRawData: 'Ada,Brann' }), { xmlDeclaration: false });
      expect(xml.split('\n')[1]).toBe('  <Characters>Ada,Brann</Characters>');
    });

    it('should write an empty issue as an empty root', () => {
      expect(serializeIssueToXml(new Issue())).toBe(
        `${DECLARATION}\n<ComicInfo xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"/>`
      );
    });

    it('should write compact output when pretty is off', () => {
      expect(serializeIssueToXml(new Issue({ series: 'S' }), { pretty: false })).toBe(
        `${DECLARATION}${ROOT_OPEN}<Series>S</Series></ComicInfo>`
      );
    });

    it('should take the pretty default from configuration', () => {
      process.env.COMICINFO_PRETTY_XML = 'false';
      clearConfigCache();

      expect(serializeIssueToXml(new Issue({ series: 'S' }), { xmlDeclaration: false })).toBe(
        `${ROOT_OPEN}<Series>S</Series></ComicInfo>`
      );
    });
  });

  describe('buildComicInfoObject', () => {
    it('should omit absent fields and pages', () => {
      expect(buildComicInfoObject(new Issue({ volume: 2 }))).toEqual({
        $: {
          'xmlns:xsd': 'http://www.w3.org/2001/XMLSchema',
          'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
        },
        Volume: '2',
      });
    });
  });

  describe('formatDecimal', () => {
    it('should always carry a fractional part', () => {
      expect(formatDecimal(5)).toBe('5.0');
      expect(formatDecimal(0)).toBe('0.0');
      expect(formatDecimal(4.25)).toBe('4.25');
    });

    it('should write small and large values without an exponent', () => {
      expect(formatDecimal(1e-7)).toBe('0.0000001');
      expect(formatDecimal(-2.5e-8)).toBe('-0.000000025');
      expect(formatDecimal(1.5e21)).toBe('1500000000000000000000.0');
    });

    it('should write a tiny community rating in plain notation', () => {
      expect(buildComicInfoObject(new Issue({ communityRating: 1e-7 }))).toEqual({
        $: {
          'xmlns:xsd': 'http://www.w3.org/2001/XMLSchema',
          'xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
        },
        CommunityRating: '0.0000001',
      });
    });
  });

  // ===========================================================================
  // Round Trips
  // ===========================================================================

  describe('round trip', () => {
    it('should reload a complete document to an equal issue', () => {
      const original = loadComicInfoFromXml(COMPLETE_COMICINFO_XML);
      const reloaded = loadComicInfoFromXml(serializeIssueToXml(original));

      expect(reloaded.toJSON()).toEqual(original.toJSON());
    });

    it('should reload compact output', () => {
      const original = loadComicInfoFromXml(MINIMAL_COMICINFO_XML);
      const reloaded = loadComicInfoFromXml(serializeIssueToXml(original, { pretty: false }));

      expect(reloaded.toJSON()).toEqual(original.toJSON());
    });

    it('should reload escaped text', () => {
      const original = new Issue({ summary: 'A & B < C > D "quoted"' });
      expect(loadComicInfoFromXml(serializeIssueToXml(original)).summary).toBe('A & B < C > D "quoted"');
    });
  });

  // ===========================================================================
  // JSON
  // ===========================================================================

  describe('JSON', () => {
    it('should write compact JSON by default', () => {
      expect(serializeIssueToJson(new Issue({ title: 'T', year: 2000 }))).toBe(
        '{"title":"T","year":2000,"pages":[]}'
      );
    });

    it('should indent when asked', () => {
      expect(serializeIssueToJson(new Issue({ title: 'T' }), { indent: 2 })).toBe(
        '{\n  "title": "T",\n  "pages": []\n}'
      );
    });

    it('should round trip through JSON', () => {
      const original = loadComicInfoFromXml(COMPLETE_COMICINFO_XML);
      const restored = deserializeIssueFromJson(serializeIssueToJson(original));

      expect(restored.toJSON()).toEqual(original.toJSON());
      expect(restored.characters).toEqual(original.characters);
    });

    it('should reject text that is not JSON', () => {
      expect(() => deserializeIssueFromJson('{title')).toThrow(ParseError);
    });

    it('should reject JSON of the wrong shape', () => {
      expect(() => deserializeIssueFromJson('{"pages":"none"}')).toThrow(SchemaError);
    });
  });
});
