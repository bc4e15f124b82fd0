/**
 * ComicInfo.xml Fixtures
 *
 * Sample XML content for testing ComicInfo loading and serialization.
 */

/**
 * Smallest useful document.
 */
export const MINIMAL_COMICINFO_XML =
  '<ComicInfo><Title>Minimal Comic</Title><Series>Test Series</Series><Number>1</Number></ComicInfo>';

/**
 * Every field populated, in schema order, with a page list.
 */
export const COMPLETE_COMICINFO_XML = `<?xml version="1.0" encoding="UTF-8"?>
<ComicInfo xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <Title>The Lantern Oath</Title>
  <Series>Skyward Lanterns</Series>
  <Number>12</Number>
  <Count>24</Count>
  <Volume>3</Volume>
  <AlternateSeries>Lantern Chronicles</AlternateSeries>
  <AlternateNumber>5</AlternateNumber>
  <AlternateCount>8</AlternateCount>
  <Summary>The lantern keepers face a storm over the harbor.</Summary>
  <Notes>Tagged by hand.</Notes>
  <Year>2021</Year>
  <Month>6</Month>
  <Day>15</Day>
  <Writer>Writer One</Writer>
  <Penciller>Penciller One</Penciller>
  <Inker>Inker One</Inker>
  <Colorist>Colorist One</Colorist>
  <Letterer>Letterer One</Letterer>
  <CoverArtist>Cover Artist One</CoverArtist>
  <Editor>Editor One</Editor>
  <Translator>Translator One</Translator>
  <Publisher>Placeholder Press</Publisher>
  <Imprint>Placeholder Imprint</Imprint>
  <Genre>Adventure, Fantasy</Genre>
  <Web>https://example.com/skyward/12 https://example.org/lanterns</Web>
  <PageCount>3</PageCount>
  <LanguageISO>en</LanguageISO>
  <Format>Series</Format>
  <BlackAndWhite>No</BlackAndWhite>
  <Manga>YesAndRightToLeft</Manga>
  <Characters>Ada, Brann, Cole</Characters>
  <Teams>Harbor Watch</Teams>
  <Locations>Port Ember, The Lighthouse</Locations>
  <ScanInformation>Scanner Group</ScanInformation>
  <StoryArc>Storm Season, Lantern Wars</StoryArc>
  <StoryArcNumber>2, 7</StoryArcNumber>
  <SeriesGroup>Lantern Universe</SeriesGroup>
  <AgeRating>Teen</AgeRating>
  <Pages>
    <Page Image="0" Type="FrontCover" ImageSize="204800" ImageWidth="1280" ImageHeight="1920"/>
    <Page Image="1" DoublePage="true" Key="spread" Bookmark="Chapter 1" ImageWidth="2560" ImageHeight="1920"/>
    <Page Image="2" Type="BackCover"/>
  </Pages>
  <CommunityRating>4.5</CommunityRating>
  <MainCharacterOrTeam>Ada</MainCharacterOrTeam>
  <Review>A steady middle chapter.</Review>
</ComicInfo>`;

/**
 * Characters that must be escaped in XML.
 */
export const SPECIAL_CHARS_COMICINFO_XML = `<?xml version="1.0" encoding="UTF-8"?>
<ComicInfo>
  <Title>Cats &amp; Dogs: "Best" Friends?</Title>
  <Series>Cats/Dogs</Series>
  <Summary>When &lt;Chaos&gt; arrives, nobody is safe.</Summary>
</ComicInfo>`;

/**
 * Whitespace-only and empty elements are absent.
 */
export const BLANK_FIELDS_COMICINFO_XML = `<ComicInfo>
  <Title>   </Title>
  <Series/>
  <Number>
  </Number>
  <Month></Month>
  <Writer>  Padded Writer  </Writer>
</ComicInfo>`;

/**
 * Mismatched closing tag.
 */
export const MALFORMED_COMICINFO_XML = '<ComicInfo><Title>Test</ComicInfo>';

/**
 * Well-formed, but not a ComicInfo document.
 */
export const WRONG_ROOT_XML = '<?xml version="1.0"?><NotComicInfo><Title>Test</Title></NotComicInfo>';

export const INVALID_MANGA_XML = '<ComicInfo><Manga>InvalidValue</Manga></ComicInfo>';

export const INVALID_DAY_XML = '<ComicInfo><Day>not a number</Day></ComicInfo>';

export const PAGE_WITHOUT_IMAGE_XML = `<ComicInfo>
  <Pages>
    <Page Type="Story"/>
  </Pages>
</ComicInfo>`;

/**
 * Lenient Page attributes with values that do not parse.
 */
export const LENIENT_PAGE_ATTRIBUTES_XML = `<ComicInfo>
  <Pages>
    <Page Image="4" DoublePage="maybe" ImageSize="big" ImageWidth="wide" ImageHeight=""/>
    <Page Image="5" DoublePage="YES"/>
    <Page Image="6" DoublePage="1"/>
  </Pages>
</ComicInfo>`;

/**
 * Build a document holding a single field element.
 */
export function singleFieldXml(element: string, value: string): string {
  return `<ComicInfo><${element}>${value}</${element}></ComicInfo>`;
}
