/**
 * Tests for text helpers
 */

import { cleanText, toTitleLabel, uniqueInOrder } from '../text';

describe('cleanText', () => {
  it('should lower-case and drop punctuation', () => {
    expect(cleanText('  Hello, World! 123 ')).toBe('hello world 123');
  });

  it('should drop non-ASCII letters', () => {
    expect(cleanText('Café Münster')).toBe('caf mnster');
  });

  it('should keep inner whitespace left behind by removed characters', () => {
    expect(cleanText('Rust & WebAssembly')).toBe('rust  webassembly');
  });

  it('should return an empty string when nothing survives', () => {
    expect(cleanText('!!! ???')).toBe('');
    expect(cleanText('')).toBe('');
  });

  it('should only ever produce trimmed lowercase alphanumerics and whitespace', () => {
    const inputs = [
      'Machine Learning',
      '  #Vegan_Recipes!! ',
      'C++ / C#',
      'Ünïcödé 2024',
      '\tTabs\tand\nlines\n',
      'dev.to/Some-Thing',
      'ALL CAPS NICHE'
    ];

    for (const input of inputs) {
      const cleaned = cleanText(input);
      expect(cleaned).toMatch(/^[a-z0-9\s]*$/);
      expect(cleaned).toBe(cleaned.trim());
    }
  });
});

describe('uniqueInOrder', () => {
  it('should keep the first occurrence of each value', () => {
    expect(uniqueInOrder(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('toTitleLabel', () => {
  it('should turn category keys into titles', () => {
    expect(toTitleLabel('reddit_communities')).toBe('Reddit Communities');
    expect(toTitleLabel('github_topics')).toBe('Github Topics');
    expect(toTitleLabel('subreddits')).toBe('Subreddits');
  });
});
