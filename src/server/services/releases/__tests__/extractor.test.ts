import { describe, it, expect } from 'vitest';
import { extractReleases, extractTitle, isAllUpperCase, toTitleCase, truncateSynopsis } from '../extractor';

const DEC_1 = 'Monday, December 1, 2025';

describe('extractReleases', () => {
  it('emits one record per platform line under a date header', () => {
    const lines = [DEC_1, 'Some Film (Netflix)', 'Synopsis: A story.', 'Another Film (Hulu)'];

    expect(extractReleases(lines)).toEqual([
      { title: 'Some Film', date: '2025-12-01', platform: 'Netflix', synopsis: 'A story.', kind: 'streaming' },
      { title: 'Another Film', date: '2025-12-01', platform: 'Hulu', synopsis: '', kind: 'streaming' },
    ]);
  });

  it('ignores platform lines before the first header', () => {
    const lines = ['Early Film (Netflix)', DEC_1, 'Later Film (Peacock)'];

    const releases = extractReleases(lines);
    expect(releases.map((r) => r.title)).toEqual(['Later Film']);
  });

  it('moves the date context forward at each header', () => {
    const lines = [DEC_1, 'First (Netflix)', 'Friday, December 5th, 2025', 'Second (Shudder)'];

    const releases = extractReleases(lines);
    expect(releases.map((r) => [r.title, r.date])).toEqual([
      ['First', '2025-12-01'],
      ['Second', '2025-12-05'],
    ]);
  });

  it('keeps the previous date when a header fails to parse', () => {
    const lines = [DEC_1, 'Tuesday, February 30, 2025', 'Some Film (Netflix)'];

    expect(extractReleases(lines)[0].date).toBe('2025-12-01');
  });

  it('never emits a malformed header that carries a platform marker', () => {
    const lines = [DEC_1, 'Monday, Decembre 1, 2025 (Netflix)', 'Real Film (Hulu)'];

    expect(extractReleases(lines)).toEqual([
      { title: 'Real Film', date: '2025-12-01', platform: 'Hulu', synopsis: '', kind: 'streaming' },
    ]);
    expect(extractReleases(['Monday, Decembre 1, 2025 (Netflix)'])).toEqual([]);
  });

  it('skips lines whose platform is not recognized', () => {
    const lines = [DEC_1, 'Film (IMAX)', 'Other Film (Netflix)'];

    expect(extractReleases(lines).map((r) => [r.title, r.platform])).toEqual([['Other Film', 'Netflix']]);
  });

  it('never emits a record for a header line', () => {
    expect(extractReleases([DEC_1, 'Tuesday, December 2, 2025'])).toEqual([]);
  });

  it('does not carry the date context across calls', () => {
    expect(extractReleases([DEC_1])).toEqual([]);
    expect(extractReleases(['Some Film (Netflix)'])).toEqual([]);
  });

  it('stops the synopsis lookahead at the next date header', () => {
    const lines = [DEC_1, 'Some Film (Netflix)', 'Tuesday, December 2, 2025', 'Synopsis: Belongs elsewhere.'];

    expect(extractReleases(lines)).toEqual([
      { title: 'Some Film', date: '2025-12-01', platform: 'Netflix', synopsis: '', kind: 'streaming' },
    ]);
  });

  it('looks at most four lines ahead for a synopsis', () => {
    const within = [DEC_1, 'Some Film (Netflix)', 'Cast: A', 'Director: B', 'Runtime: C', 'Synopsis: Close.'];
    const beyond = [DEC_1, 'Some Film (Netflix)', 'Cast: A', 'Director: B', 'Runtime: C', 'Rated: D', 'Synopsis: Too far.'];

    expect(extractReleases(within)[0].synopsis).toBe('Close.');
    expect(extractReleases(beyond)[0].synopsis).toBe('');
  });

  it('rejects structural titles and one-character titles', () => {
    const lines = [DEC_1, 'Synopsis (Netflix)', 'CAST (Hulu)', 'X (Starz)'];

    expect(extractReleases(lines)).toEqual([]);
  });

  it('skips platform lines without a trailing parenthesized group', () => {
    const lines = [DEC_1, 'Now on (Netflix) everywhere'];

    expect(extractReleases(lines)).toEqual([]);
  });

  it('strips square brackets and title-cases shouted titles', () => {
    const lines = [DEC_1, '[Bracketed Film] (Prime Video)', 'THE LONG WALK (Starz)', 'iPhone DIARIES (Tubi)'];

    expect(extractReleases(lines).map((r) => r.title)).toEqual(['Bracketed Film', 'The Long Walk', 'iPhone DIARIES']);
  });

  it('drops records outside the requested month', () => {
    const lines = ['Wednesday, December 31, 2025', 'Last Film (Netflix)', 'Thursday, January 1, 2026', 'First Film (Hulu)'];

    const releases = extractReleases(lines, { window: { month: 'december', year: 2025 } });
    expect(releases.map((r) => r.title)).toEqual(['Last Film']);
  });

  it('truncates long synopses when asked to', () => {
    const lines = [DEC_1, 'Some Film (Netflix)', 'Synopsis: A long story about things'];

    expect(extractReleases(lines, { synopsisMaxLength: 10 })[0].synopsis).toBe('A long sto...');
  });
});

describe('extractTitle', () => {
  it('takes the text before the trailing group', () => {
    expect(extractTitle('Knives Out (2019) (Netflix)')).toBe('Knives Out (2019)');
  });

  it('returns null without a trailing group', () => {
    expect(extractTitle('No platform here')).toBeNull();
  });
});

describe('title case helpers', () => {
  it('detects all upper-case titles', () => {
    expect(isAllUpperCase('THE LONG WALK')).toBe(true);
    expect(isAllUpperCase('M3GAN 2.0')).toBe(true);
    expect(isAllUpperCase('The Long Walk')).toBe(false);
    expect(isAllUpperCase('1917')).toBe(false);
  });

  it('capitalizes each word', () => {
    expect(toTitleCase("DON'T LOOK UP")).toBe("Don't Look Up");
    expect(toTitleCase('SPIDER-MAN')).toBe('Spider-Man');
  });
});

describe('truncateSynopsis', () => {
  it('leaves short text alone', () => {
    expect(truncateSynopsis('Short.', 10)).toBe('Short.');
    expect(truncateSynopsis('No limit at all')).toBe('No limit at all');
  });
});
