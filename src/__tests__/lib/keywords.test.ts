import { describe, expect, it } from 'vitest';
import { mergeKeywords } from '../../lib/keywords';

describe('mergeKeywords', () => {
  it('dedupes extras case-insensitively against the base list', () => {
    expect(mergeKeywords(['hiring', 'talent'], 'Remote Work, remote work, Hiring')).toEqual([
      'hiring',
      'talent',
      'remote work',
    ]);
  });

  it('keeps base casing and lower-cases appended extras', () => {
    expect(mergeKeywords(['Talent Acquisition'], 'talent acquisition, AI Screening')).toEqual([
      'Talent Acquisition',
      'ai screening',
    ]);
  });

  it('is idempotent when the same extras are merged again', () => {
    const once = mergeKeywords(['hiring'], 'onboarding, Retention');
    expect(mergeKeywords(once, 'onboarding, Retention')).toEqual(once);
  });

  it('normalizes whitespace and skips empty entries', () => {
    expect(mergeKeywords(['  employer   branding '], ' , ,  graduate  schemes ')).toEqual([
      'employer branding',
      'graduate schemes',
    ]);
  });

  it('returns a copy of the base list when there are no extras', () => {
    const base = ['hiring'];
    const merged = mergeKeywords(base, undefined);
    expect(merged).toEqual(['hiring']);
    expect(merged).not.toBe(base);
  });
});
