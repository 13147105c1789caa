import { describe, it, expect } from 'vitest';
import { scan } from '../src/scanner';
import { compilePattern } from '../src/pattern';
import { readToken } from '../src/token';
import type { SequenceEntry } from '../src/types';

// One chord per bar, literal = token
function sequenceOf(tokens: string[]): SequenceEntry[] {
  return tokens.map((token, i) => ({
    bar: i + 1,
    token,
    literal: token,
    quality: readToken(token)?.quality ?? 'Unresolved',
  }));
}

describe('scan', () => {
  it('should find an exact progression', () => {
    const sequence = sequenceOf(['I', 'ii-7', 'V7', 'Imaj7', 'vi']);
    const hits = scan(sequence, compilePattern('ii-7 V7 Imaj7'));

    expect(hits).toEqual([
      {
        startBar: 2,
        startIndex: 1,
        matchedTokens: ['ii-7', 'V7', 'Imaj7'],
        matchedLiterals: ['ii-7', 'V7', 'Imaj7'],
      },
    ]);
  });

  it('should mix exact and wildcard elements', () => {
    const sequence = sequenceOf(['ii-7', 'V7', 'I6', 'ii-7', 'V7(b9)', 'Imaj7']);
    const hits = scan(sequence, compilePattern('ii-7 V7* I*'));

    expect(hits.map((h) => h.startBar)).toEqual([1, 4]);
    expect(hits[1].matchedTokens).toEqual(['ii-7', 'V7(b9)', 'Imaj7']);
  });

  it('should keep overlapping hits', () => {
    const sequence = sequenceOf(['V7', 'V7', 'V7', 'V7']);
    const hits = scan(sequence, compilePattern('V7* V7*'));

    expect(hits.map((h) => h.startIndex)).toEqual([0, 1, 2]);
  });

  it('should not skip unresolved entries', () => {
    const sequence = sequenceOf(['ii-7', '', 'V7']);
    expect(scan(sequence, compilePattern('ii-7 V7'))).toEqual([]);
  });

  it('should report the bar of the first chord when bars repeat', () => {
    const sequence: SequenceEntry[] = [
      { bar: 7, token: 'ii-7', literal: 'Dm7', quality: 'MinorSeven' },
      { bar: 7, token: 'V7', literal: 'G7', quality: 'Dominant7' },
      { bar: 8, token: 'I', literal: 'C', quality: 'MajorPlain' },
    ];
    const hits = scan(sequence, compilePattern('V7 I*'));

    expect(hits).toEqual([
      { startBar: 7, startIndex: 1, matchedTokens: ['V7', 'I'], matchedLiterals: ['G7', 'C'] },
    ]);
  });

  it('should return nothing when the pattern is longer than the sequence', () => {
    expect(scan(sequenceOf(['V7']), compilePattern('V7 I'))).toEqual([]);
  });

  it('should accept a bare token list', () => {
    const sequence = sequenceOf(['IV', 'V7', 'I']);
    const hits = scan(sequence, compilePattern('V7 I').tokens);
    expect(hits.map((h) => h.startBar)).toEqual([2]);
  });

  it('should return nothing for an empty token list', () => {
    expect(scan(sequenceOf(['I']), [])).toEqual([]);
  });
});
