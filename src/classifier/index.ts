import type { Quality } from '../types';

// ============================================================
// Literal anatomy
// ============================================================

// A roman head is tried before a pitch letter so that "bVII7" is not read as B-flat.
const ROMAN_ROOT = /^[b#]?(?:VII|VI|V|IV|III|II|I|vii|vi|v|iv|iii|ii|i)/;
const PITCH_ROOT = /^[A-Ga-g][#b]?/;
const SLASH_BASS = /\/\s*[A-Ga-g][#b]?\s*$/;

export interface LiteralParts {
  root: string;
  rootKind: 'roman' | 'pitch' | 'none';
  /** Quality-bearing text: root and slash bass removed */
  body: string;
}

/**
 * Split a literal into root and quality-bearing body.
 * `"Dm7/G"` → `m7`, `"bVII7"` → `7`, `"Csus4"` → `sus4`.
 */
export function splitLiteral(literal: string): LiteralParts {
  const trimmed = literal.trim();
  const roman = ROMAN_ROOT.exec(trimmed);
  const pitch = roman ? null : PITCH_ROOT.exec(trimmed);
  const root = roman?.[0] ?? pitch?.[0] ?? '';
  const body = trimmed.slice(root.length).replace(SLASH_BASS, '').trim();
  return {
    root,
    rootKind: roman ? 'roman' : pitch ? 'pitch' : 'none',
    body,
  };
}

// ============================================================
// Literal markers
// ============================================================

const DIMINISHED_SEVENTH = /dim7|°7|o7/i;
const HALF_DIMINISHED = /m(?:in)?7\s*(?:b|-)5|ø/i;
const MINOR_MAJOR_SEVENTH = /^(?:min|m|-)\s*\(?\s*(?:maj|\^|Δ)/i;
const MAJOR_FAMILY = /(?:maj|\^|Δ)\s*(?:7|9|13)(?!\d)/i;
const MINOR_SIXTH = /^(?:min|m|-)6(?!\d)/i;
const SIX_NINE = /6\s*(?:\/|-|\+|add|\()\s*9|(?<!\d)69(?!\d)/i;
const MINOR_PREFIX = /^(?:min|m(?!aj)|-)/i;
const TRAILING_SIXTH = /(?<![\d#b+-])6$/;
const MINOR_SEVENTH = /(?<![a-z])(?:min|m)(?:7|9|11|13)(?!\d)|^-(?:7|9|11|13)(?!\d)/i;
const PLAIN_EXTENSION =
  /(?<![\d#b+\-]|add\s*|maj|\^|Δ|ø|o|°|m|min)(?:7|9|11|13)(?!\d)/i;
const MINOR_TRIAD = /^(?:min|m)(?=$|[/\s(]|\d)/i;
const ADDITIONS_ONLY = /^(?:\(?\s*add\s*\d+\s*\)?\s*)*$/i;

function isBareRoot(parts: LiteralParts): boolean {
  return parts.rootKind !== 'none' && ADDITIONS_ONLY.test(parts.body);
}

function isLowercaseRoman(parts: LiteralParts): boolean {
  return parts.rootKind === 'roman' && /^[b#]?[iv]/.test(parts.root);
}

export interface QualityRule {
  name: string;
  quality: Quality;
  test: (parts: LiteralParts) => boolean;
}

/**
 * Literal-first decision table. Evaluated top to bottom, the first rule
 * whose predicate holds decides the quality.
 */
export const QUALITY_RULES: readonly QualityRule[] = [
  { name: 'diminished-seventh', quality: 'Diminished7', test: ({ body }) => DIMINISHED_SEVENTH.test(body) },
  { name: 'half-diminished', quality: 'HalfDiminished7', test: ({ body }) => HALF_DIMINISHED.test(body) },
  { name: 'minor-major-seventh', quality: 'MinorMaj7', test: ({ body }) => MINOR_MAJOR_SEVENTH.test(body) },
  { name: 'major-family', quality: 'MajorMaj7', test: ({ body }) => MAJOR_FAMILY.test(body) },
  { name: 'minor-sixth', quality: 'MinorSix', test: ({ body }) => MINOR_SIXTH.test(body) },
  // 6/9 is rarely written distinctly for minor chords
  {
    name: 'minor-six-nine',
    quality: 'MinorSix',
    test: ({ body }) => SIX_NINE.test(body) && MINOR_PREFIX.test(body),
  },
  { name: 'six-nine', quality: 'MajorSixNine', test: ({ body }) => SIX_NINE.test(body) },
  { name: 'major-sixth', quality: 'MajorSix', test: ({ body }) => TRAILING_SIXTH.test(body) },
  { name: 'minor-seventh', quality: 'MinorSeven', test: ({ body }) => MINOR_SEVENTH.test(body) },
  { name: 'dominant-seventh', quality: 'Dominant7', test: ({ body }) => PLAIN_EXTENSION.test(body) },
  { name: 'minor-triad', quality: 'MinorTriad', test: ({ body }) => MINOR_TRIAD.test(body) },
  { name: 'minor-roman-numeral', quality: 'MinorTriad', test: (p) => isBareRoot(p) && isLowercaseRoman(p) },
  { name: 'major-triad', quality: 'MajorPlain', test: (p) => isBareRoot(p) },
];

// ============================================================
// Raw quality tail (harmonic-analysis output)
// ============================================================

const MAJ7_ALIASES = /\^7|M7|Δ7|Δ/g;
const INVERSION_FIGURES = /65|64|63|62|54|53|43|42|32/g;

/**
 * Lower-case the raw tail, spell major-seventh aliases as `maj7` and drop
 * figured-bass inversion digits, which describe voicing rather than quality.
 */
export function cleanQualityTail(rawQualityTail: string): string {
  return rawQualityTail
    .replace(/\s+/g, '')
    .replace(MAJ7_ALIASES, 'maj7')
    .toLowerCase()
    .replace(INVERSION_FIGURES, '');
}

function isPlainSeventhTail(tail: string): boolean {
  return tail.includes('7') && !tail.includes('maj') && !tail.includes('ø') && !tail.includes('o');
}

/**
 * Quality implied by the raw tail alone. Used when the literal decides nothing.
 * A lowercase raw degree with a plain `7` reads as a minor seventh.
 */
export function classifyQualityTail(rawQualityTail: string, rawDegreeHead = ''): Quality {
  const tail = cleanQualityTail(rawQualityTail);
  const minorDegree = /^[b#]?[iv]/.test(rawDegreeHead);

  if (tail.includes('maj')) return 'MajorMaj7';
  if (tail.includes('ø')) return 'HalfDiminished7';
  if (tail.includes('o7') || tail.includes('°7')) return 'Diminished7';
  if (tail.includes('6/9') || tail.includes('69')) return 'MajorSixNine';
  if (/(?<!\d)6(?![049])/.test(tail)) return 'MajorSix';
  if (isPlainSeventhTail(tail)) return minorDegree ? 'MinorSeven' : 'Dominant7';
  return 'Unresolved';
}

/**
 * Decide the harmonic quality of a chord.
 *
 * The normalized literal is authoritative; the raw quality tail from the
 * harmonic analysis (and the case of the raw degree) is consulted only when
 * no literal rule applies.
 */
export function classify(normalizedLiteral: string, rawQualityTail: string, rawDegreeHead = ''): Quality {
  const rule = matchingRule(normalizedLiteral);
  return rule ? rule.quality : classifyQualityTail(rawQualityTail, rawDegreeHead);
}

/** The literal rule that decides, or undefined when the tail has to */
export function matchingRule(normalizedLiteral: string): QualityRule | undefined {
  const parts = splitLiteral(normalizedLiteral);
  if (parts.rootKind === 'none' && !parts.body) return undefined;
  return QUALITY_RULES.find((rule) => rule.test(parts));
}
