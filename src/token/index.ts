import type { DegreeAccidental, Quality, SixNineStyle, TokenOptions } from '../types';

export const DEGREE_HEAD = /^([b#]?)(VII|VI|V|IV|III|II|I|vii|vi|v|iv|iii|ii|i)/;
const DEGREE_HEAD_ONLY = /^([b#]?)(VII|VI|V|IV|III|II|I|vii|vi|v|iv|iii|ii|i)$/;

const DEFAULT_SIX_NINE: SixNineStyle = '69';

const LOWERCASE_QUALITIES: ReadonlySet<Quality> = new Set<Quality>([
  'MinorTriad',
  'MinorSix',
  'MinorSeven',
  'MinorMaj7',
  'Diminished7',
  'HalfDiminished7',
]);

export interface DegreeHead {
  accidental: DegreeAccidental;
  degree: string;
}

function isDegreeAccidental(value: string): value is DegreeAccidental {
  return value === '' || value === 'b' || value === '#';
}

/**
 * Split a degree head such as `bVII` into accidental and numeral.
 * Returns undefined when the text is not exactly one degree head.
 */
export function parseDegreeHead(text: string): DegreeHead | undefined {
  const m = DEGREE_HEAD_ONLY.exec(text.trim());
  if (!m || !isDegreeAccidental(m[1])) return undefined;
  return { accidental: m[1], degree: m[2] };
}

export function isLowercaseDegree(degree: string): boolean {
  return degree === degree.toLowerCase();
}

/**
 * Suffix for a quality. Unresolved chords carry no suffix.
 */
export function qualitySuffix(quality: Quality, options: TokenOptions = {}): string {
  switch (quality) {
    case 'MajorPlain':
    case 'MinorTriad':
    case 'Unresolved':
      return '';
    case 'MajorSix':
      return '6';
    case 'MajorMaj7':
    case 'MinorMaj7':
      return 'maj7';
    case 'MajorSixNine':
      return options.sixNineStyle ?? DEFAULT_SIX_NINE;
    case 'Dominant7':
      return '7';
    case 'MinorSix':
      return '-6';
    case 'MinorSeven':
      return '-7';
    case 'Diminished7':
      return 'o7';
    case 'HalfDiminished7':
      return 'ø7';
  }
}

function degreeCase(degree: string, quality: Quality): string {
  if (quality === 'Dominant7') return degree.toUpperCase();
  if (LOWERCASE_QUALITIES.has(quality) || isLowercaseDegree(degree)) {
    return degree.toLowerCase();
  }
  return degree.toUpperCase();
}

// b9/#9 as written tensions, not as a root spelling like "Ab9" or "F#9"
const FLAT_NINE = /(?<![A-Ga-g])b9(?!\d)/;
const SHARP_NINE = /(?<![A-Ga-g])#9(?!\d)/;

/**
 * Tensions written in the literal, in display order.
 */
export function detectTensions(normalizedLiteral: string): string[] {
  const tensions: string[] = [];
  if (FLAT_NINE.test(normalizedLiteral)) tensions.push('b9');
  if (SHARP_NINE.test(normalizedLiteral)) tensions.push('#9');
  return tensions;
}

/**
 * Build the canonical token for a classified chord.
 *
 * Dominant sevenths always print an uppercase degree; minor, diminished and
 * half-diminished qualities print lowercase; otherwise the raw degree's case
 * is kept. Tensions found in the literal are appended in parentheses.
 *
 * A raw degree head outside the I..VII vocabulary is returned unchanged.
 *
 * @example
 * buildToken('v', 'Dominant7', 'D7') // 'V7'
 * buildToken('i', 'MinorSix', 'Cm6') // 'i-6'
 * buildToken('V', 'Dominant7', 'G7(b9)') // 'V7(b9)'
 */
export function buildToken(
  rawDegreeHead: string,
  quality: Quality,
  normalizedLiteral: string,
  options: TokenOptions = {}
): string {
  const head = parseDegreeHead(rawDegreeHead);
  if (!head) return rawDegreeHead;

  const degree = degreeCase(head.degree, quality);
  const base = `${head.accidental}${degree}${qualitySuffix(quality, options)}`;
  if (quality === 'Unresolved') return base;

  const tensions = detectTensions(normalizedLiteral);
  return tensions.length > 0 ? `${base}(${tensions.join(',')})` : base;
}

// ============================================================
// Reading canonical tokens back
// ============================================================

export interface ParsedToken {
  accidental: DegreeAccidental;
  degree: string;
  /** `accidental + degree` */
  head: string;
  suffix: string;
  tensions: string[];
  /** Quality implied by the token text */
  quality: Quality;
}

const TENSIONS_GROUP = /\(([^)]*)\)$/;

function qualityFromSuffix(suffix: string, lowercase: boolean): Quality {
  switch (suffix) {
    case '':
      return lowercase ? 'MinorTriad' : 'MajorPlain';
    case '6':
      return 'MajorSix';
    case 'maj7':
      return lowercase ? 'MinorMaj7' : 'MajorMaj7';
    case '69':
    case '6/9':
      return 'MajorSixNine';
    case '7':
      return 'Dominant7';
    case '-6':
      return 'MinorSix';
    case '-7':
      return 'MinorSeven';
    case 'o7':
      return 'Diminished7';
    case 'ø7':
      return 'HalfDiminished7';
    default:
      return 'Unresolved';
  }
}

/**
 * Parse a canonical token into its parts.
 *
 * The quality is inferred from the text alone: a lowercase `maj7` reads as
 * minor-major seventh and a bare degree as a plain triad of the degree's case.
 * Returns undefined for tokens without a degree head (e.g. the empty token).
 */
export function readToken(token: string): ParsedToken | undefined {
  const m = DEGREE_HEAD.exec(token);
  if (!m || !isDegreeAccidental(m[1])) return undefined;

  let rest = token.slice(m[0].length);
  let tensions: string[] = [];
  const group = TENSIONS_GROUP.exec(rest);
  if (group) {
    tensions = group[1].split(',').map((t) => t.trim()).filter((t) => t.length > 0);
    rest = rest.slice(0, group.index);
  }

  return {
    accidental: m[1],
    degree: m[2],
    head: m[0],
    suffix: rest,
    tensions,
    quality: qualityFromSuffix(rest, isLowercaseDegree(m[2])),
  };
}
