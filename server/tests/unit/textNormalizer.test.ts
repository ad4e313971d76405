import { describe, it, expect } from 'vitest';
import { normalizeText } from '../../utils/deduplication';

describe('normalizeText', () => {
  it('returns an empty string for missing or blank input', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText('')).toBe('');
    expect(normalizeText('   ')).toBe('');
  });

  it('lower-cases and collapses whitespace', () => {
    expect(normalizeText('  Hello   World  ')).toBe('hello world');
    expect(normalizeText('Line one\nLine\ttwo')).toBe('line one line two');
    expect(normalizeText('a \t\n b')).toBe('a b');
  });

  it('folds typographic punctuation', () => {
    expect(normalizeText('“Stay hungry” — Jobs…')).toBe('"stay hungry" - jobs');
    expect(normalizeText('It’s a ‘test’ – ok')).toBe("it's a 'test' - ok");
  });

  it('strips every trailing period', () => {
    expect(normalizeText('Mark Twain..')).toBe('mark twain');
    expect(normalizeText('Oscar Wilde. .')).toBe('oscar wilde');
    expect(normalizeText('...')).toBe('');
  });

  it('keeps other trailing punctuation', () => {
    expect(normalizeText('Really?!')).toBe('really?!');
  });

  it('is idempotent', () => {
    const samples = ['  Be Yourself.  ', '“Quoted…”\n\tText ..', 'Wait -- what?', 'x . . .'];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});
