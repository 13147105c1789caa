import { describe, it, expect } from 'vitest';
import {
  candidateFromToken,
  compilePattern,
  familyOf,
  matchesElement,
  PatternSyntaxError,
} from '../src/pattern';
import type { PatternToken } from '../src/types';

function element(text: string): PatternToken {
  return compilePattern(text).tokens[0];
}

function matches(patternElement: string, token: string): boolean {
  return matchesElement(element(patternElement), candidateFromToken(token));
}

describe('compilePattern', () => {
  it('should compile exact and wildcard elements', () => {
    const pattern = compilePattern('ii-7 V7 I*');

    expect(pattern.source).toBe('ii-7 V7 I*');
    expect(pattern.tokens).toEqual([
      { text: 'ii-7', accidental: '', degree: 'ii', exactSuffix: '-7', isWildcard: false },
      { text: 'V7', accidental: '', degree: 'V', exactSuffix: '7', isWildcard: false },
      { text: 'I', accidental: '', degree: 'I', isWildcard: true, family: 'major' },
    ]);
  });

  it('should trim the source and split on any whitespace', () => {
    const pattern = compilePattern('  V7\t I ');
    expect(pattern.source).toBe('V7\t I');
    expect(pattern.tokens.map((t) => t.text)).toEqual(['V7', 'I']);
  });

  it('should keep accidentals', () => {
    expect(element('bVII7*')).toEqual({
      text: 'bVII7',
      accidental: 'b',
      degree: 'VII',
      exactSuffix: '7',
      isWildcard: true,
      family: 'dominant7',
    });
  });

  it('should pick the family from degree case and suffix', () => {
    expect(element('I6*').family).toBe('major');
    expect(element('Imaj7*').family).toBe('major');
    expect(element('V7*').family).toBe('dominant7');
    expect(element('ii*').family).toBe('minor');
    expect(element('ii-7*').family).toBe('minor');
    expect(element('iimaj7*').family).toBe('minor');
  });

  describe('6/9 spelling', () => {
    it('should accept both spellings', () => {
      expect(element('I6/9').text).toBe('I69');
      expect(element('I69').text).toBe('I69');
    });

    it('should use the configured spelling', () => {
      const pattern = compilePattern('I69 I6/9*', { sixNineStyle: '6/9' });
      expect(pattern.tokens.map((t) => t.text)).toEqual(['I6/9', 'I6/9']);
      expect(pattern.tokens[1].family).toBe('major');
    });
  });

  describe('errors', () => {
    it('should reject an unknown degree', () => {
      expect(() => compilePattern('ii-7 X7')).toThrow(PatternSyntaxError);
      expect(() => compilePattern('ii-7 X7')).toThrow(
        "Bad token syntax: 'X7' in pattern 'ii-7 X7' (expected [b|#]DEGREE[suffix][*])"
      );
    });

    it('should reject a misplaced star', () => {
      expect(() => compilePattern('V*7')).toThrow("Bad token syntax: 'V*7'");
    });

    it('should reject a wildcard that names no family', () => {
      expect(() => compilePattern('ii7*')).toThrow(
        "Bad token syntax: 'ii7*' in pattern 'ii7*' ('7*' names no chord family)"
      );
      expect(() => compilePattern('Vo7*')).toThrow(PatternSyntaxError);
    });

    it('should reject an empty pattern', () => {
      expect(() => compilePattern('   ')).toThrow('pattern is empty');
    });

    it('should carry the token and pattern', () => {
      try {
        compilePattern('I IX');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(PatternSyntaxError);
        if (error instanceof PatternSyntaxError) {
          expect(error.token).toBe('IX');
          expect(error.pattern).toBe('I IX');
        }
      }
    });
  });
});

describe('familyOf', () => {
  it('should map uppercase degrees', () => {
    expect(familyOf('IV', '')).toBe('major');
    expect(familyOf('IV', '6/9')).toBe('major');
    expect(familyOf('V', '7')).toBe('dominant7');
    expect(familyOf('V', 'ø7')).toBeUndefined();
  });

  it('should map lowercase degrees', () => {
    expect(familyOf('vi', '-6')).toBe('minor');
    expect(familyOf('vi', '6')).toBeUndefined();
  });
});

describe('matchesElement', () => {
  it('should match exact elements by string equality', () => {
    expect(matches('V7', 'V7')).toBe(true);
    expect(matches('V7', 'V7(b9)')).toBe(false);
    expect(matches('ii-7', 'ii')).toBe(false);
  });

  describe('major family', () => {
    it.each(['I', 'I6', 'Imaj7', 'I69'])('I* should match %s', (token) => {
      expect(matches('I*', token)).toBe(true);
    });

    it.each(['ii', 'V7', 'I7', 'i', 'bI'])('I* should not match %s', (token) => {
      expect(matches('I*', token)).toBe(false);
    });
  });

  describe('dominant family', () => {
    it.each(['V7', 'V7(b9)', 'V7(b9,#9)'])('V7* should match %s', (token) => {
      expect(matches('V7*', token)).toBe(true);
    });

    it.each(['Vmaj7', 'viiø7', 'V'])('V7* should not match %s', (token) => {
      expect(matches('V7*', token)).toBe(false);
    });
  });

  describe('minor family', () => {
    it.each(['ii', 'ii-6', 'ii-7', 'iimaj7'])('ii* should match %s', (token) => {
      expect(matches('ii*', token)).toBe(true);
    });

    it.each(['ii7', 'iio7', 'iiø7', 'II'])('ii* should not match %s', (token) => {
      expect(matches('ii*', token)).toBe(false);
    });
  });

  it('should require the same accidental', () => {
    expect(matches('bVII*', 'bVII')).toBe(true);
    expect(matches('bVII*', 'VII')).toBe(false);
  });

  it('should use the quality carried by the candidate', () => {
    const wildcard = element('I*');
    expect(matchesElement(wildcard, { token: 'I', quality: 'Unresolved' })).toBe(false);
    expect(matchesElement(wildcard, { token: 'I', quality: 'MajorPlain' })).toBe(true);
  });
});
