import { describe, it, expect } from 'vitest';
import {
  buildToken,
  detectTensions,
  parseDegreeHead,
  qualitySuffix,
  readToken,
} from '../src/token';
import { classify } from '../src/classifier';
import { QUALITIES } from '../src/types';

describe('parseDegreeHead', () => {
  it('should split accidental and numeral', () => {
    expect(parseDegreeHead('bVII')).toEqual({ accidental: 'b', degree: 'VII' });
    expect(parseDegreeHead('#iv')).toEqual({ accidental: '#', degree: 'iv' });
    expect(parseDegreeHead('V')).toEqual({ accidental: '', degree: 'V' });
  });

  it('should reject anything but a single degree head', () => {
    expect(parseDegreeHead('ii7')).toBeUndefined();
    expect(parseDegreeHead('VIII')).toBeUndefined();
    expect(parseDegreeHead('')).toBeUndefined();
  });
});

describe('qualitySuffix', () => {
  it('should give one suffix per quality', () => {
    const suffixes = Object.fromEntries(QUALITIES.map((q) => [q, qualitySuffix(q)]));
    expect(suffixes).toEqual({
      MajorPlain: '',
      MajorSix: '6',
      MajorMaj7: 'maj7',
      MajorSixNine: '69',
      Dominant7: '7',
      MinorTriad: '',
      MinorSix: '-6',
      MinorSeven: '-7',
      MinorMaj7: 'maj7',
      Diminished7: 'o7',
      HalfDiminished7: 'ø7',
      Unresolved: '',
    });
  });

  it('should follow the configured 6/9 spelling', () => {
    expect(qualitySuffix('MajorSixNine', { sixNineStyle: '6/9' })).toBe('6/9');
  });
});

describe('detectTensions', () => {
  it('should list flat and sharp nines in display order', () => {
    expect(detectTensions('C7#9b9')).toEqual(['b9', '#9']);
    expect(detectTensions('G7(b9)')).toEqual(['b9']);
  });

  it('should not read a root spelling as a tension', () => {
    expect(detectTensions('Ab9')).toEqual([]);
    expect(detectTensions('F#9')).toEqual([]);
  });

  it('should ignore b13 and friends', () => {
    expect(detectTensions('G7b13')).toEqual([]);
  });
});

describe('buildToken', () => {
  it('should print dominant sevenths with an uppercase degree', () => {
    expect(buildToken('v', 'Dominant7', 'D7sus4')).toBe('V7');
    expect(buildToken('bVII', 'Dominant7', 'Bb7')).toBe('bVII7');
  });

  it('should print minor qualities with a lowercase degree', () => {
    expect(buildToken('i', 'MinorSix', 'Cm6')).toBe('i-6');
    expect(buildToken('III', 'MinorSeven', 'Em7')).toBe('iii-7');
    expect(buildToken('VII', 'Diminished7', 'Bdim7')).toBe('viio7');
    expect(buildToken('VII', 'HalfDiminished7', 'Bm7b5')).toBe('viiø7');
  });

  it('should keep the raw case for major qualities', () => {
    expect(buildToken('I', 'MajorMaj7', 'Cmaj7')).toBe('Imaj7');
    expect(buildToken('ii', 'MajorMaj7', 'Dmaj7')).toBe('iimaj7');
    expect(buildToken('iii', 'MajorSix', 'E6')).toBe('iii6');
  });

  it('should spell 6/9 chords in the configured style', () => {
    expect(buildToken('I', 'MajorSixNine', 'C6/9')).toBe('I69');
    expect(buildToken('I', 'MajorSixNine', 'C6/9', { sixNineStyle: '6/9' })).toBe('I6/9');
  });

  it('should append tensions found in the literal', () => {
    expect(buildToken('V', 'Dominant7', 'G7(b9)')).toBe('V7(b9)');
    expect(buildToken('V', 'Dominant7', 'G7b9#9')).toBe('V7(b9,#9)');
    expect(buildToken('I', 'Dominant7', 'Ab9')).toBe('I7');
  });

  it('should print the degree only for unresolved chords', () => {
    expect(buildToken('I', 'Unresolved', 'Csus4')).toBe('I');
    expect(buildToken('V', 'Unresolved', 'Gsus4(b9)')).toBe('V');
  });

  it('should return an unknown degree head unchanged', () => {
    expect(buildToken('VIII', 'MajorPlain', 'C')).toBe('VIII');
  });
});

describe('readToken', () => {
  it('should parse degree, suffix and tensions', () => {
    expect(readToken('V7(b9,#9)')).toEqual({
      accidental: '',
      degree: 'V',
      head: 'V',
      suffix: '7',
      tensions: ['b9', '#9'],
      quality: 'Dominant7',
    });
  });

  it('should parse an accidental', () => {
    const parsed = readToken('bVIImaj7');
    expect(parsed?.accidental).toBe('b');
    expect(parsed?.degree).toBe('VII');
    expect(parsed?.quality).toBe('MajorMaj7');
  });

  it('should infer the quality from suffix and case', () => {
    expect(readToken('I')?.quality).toBe('MajorPlain');
    expect(readToken('ii')?.quality).toBe('MinorTriad');
    expect(readToken('iimaj7')?.quality).toBe('MinorMaj7');
    expect(readToken('I6/9')?.quality).toBe('MajorSixNine');
    expect(readToken('vi-6')?.quality).toBe('MinorSix');
  });

  it('should return undefined for a token without a degree', () => {
    expect(readToken('')).toBeUndefined();
    expect(readToken('N.C.')).toBeUndefined();
  });

  it('should mark unknown suffixes as unresolved', () => {
    expect(readToken('Vsus4')?.quality).toBe('Unresolved');
  });
});

const CANONICAL_TOKENS = [
  'I',
  'ii',
  'I6',
  'Imaj7',
  'I69',
  'V7',
  'V7(b9)',
  'V7(b9,#9)',
  'ii-7',
  'vi-6',
  'viio7',
  'viiø7',
  'iimaj7',
  'bVII7',
  'iii6',
];

describe('canonical tokens', () => {
  it.each(CANONICAL_TOKENS)('should rebuild %s from its own degree and quality', (token) => {
    const parsed = readToken(token);
    expect(parsed).toBeDefined();
    if (!parsed) return;
    expect(buildToken(parsed.head, parsed.quality, parsed.tensions.join(' '))).toBe(token);
  });

  it.each(CANONICAL_TOKENS)('should reproduce %s when its text is read as a literal', (token) => {
    const head = readToken(token)?.head ?? '';
    expect(buildToken(head, classify(token, ''), token)).toBe(token);
  });
});
