import { readToken } from '../token';
import type {
  CompiledPattern,
  DegreeAccidental,
  Family,
  PatternToken,
  Quality,
  SequenceEntry,
  TokenOptions,
} from '../types';

// [accidental] degree [exact suffix] [*]
const PATTERN_TOKEN =
  /^([b#]?)(VII|VI|V|IV|III|II|I|vii|vi|v|iv|iii|ii|i)(maj7|-7|7|ø7|o7|6\/9|69|-6|6)?(\*)?$/;

const MAJOR_FAMILY_SUFFIXES = new Set(['', '6', 'maj7', '6/9', '69']);
const MINOR_FAMILY_SUFFIXES = new Set(['', '-6', '-7', 'maj7']);

export const FAMILY_QUALITIES: Record<Family, ReadonlySet<Quality>> = {
  major: new Set<Quality>(['MajorPlain', 'MajorSix', 'MajorMaj7', 'MajorSixNine']),
  minor: new Set<Quality>(['MinorTriad', 'MinorSix', 'MinorSeven', 'MinorMaj7']),
  dominant7: new Set<Quality>(['Dominant7']),
};

/**
 * Pattern compilation error
 */
export class PatternSyntaxError extends Error {
  constructor(
    public readonly token: string,
    public readonly pattern: string,
    reason: string
  ) {
    super(`Bad token syntax: '${token}' in pattern '${pattern}' (${reason})`);
    this.name = 'PatternSyntaxError';
  }
}

function isDegreeAccidental(value: string): value is DegreeAccidental {
  return value === '' || value === 'b' || value === '#';
}

/**
 * Family selected by a wildcard element, or undefined when the
 * degree/suffix combination names no family.
 */
export function familyOf(degree: string, exactSuffix: string): Family | undefined {
  const uppercase = degree === degree.toUpperCase();
  if (uppercase) {
    if (exactSuffix === '7') return 'dominant7';
    return MAJOR_FAMILY_SUFFIXES.has(exactSuffix) ? 'major' : undefined;
  }
  return MINOR_FAMILY_SUFFIXES.has(exactSuffix) ? 'minor' : undefined;
}

function compileToken(text: string, pattern: string, options: TokenOptions): PatternToken {
  const m = PATTERN_TOKEN.exec(text);
  const accidental = m?.[1] ?? '';
  if (!m || !isDegreeAccidental(accidental)) {
    throw new PatternSyntaxError(text, pattern, 'expected [b|#]DEGREE[suffix][*]');
  }

  const degree = m[2];
  const rawSuffix = m[3] ?? '';
  const star = m[4];
  const isSixNine = rawSuffix === '69' || rawSuffix === '6/9';
  const suffix = isSixNine ? (options.sixNineStyle ?? '69') : rawSuffix;
  const isWildcard = star === '*';

  const token: PatternToken = {
    text: `${accidental}${degree}${suffix}`,
    accidental,
    degree,
    isWildcard,
  };
  if (suffix) token.exactSuffix = suffix;

  if (isWildcard) {
    const family = familyOf(degree, isSixNine ? '6/9' : suffix);
    if (!family) {
      throw new PatternSyntaxError(text, pattern, `'${suffix}*' names no chord family`);
    }
    token.family = family;
  }

  return token;
}

/**
 * Compile a whitespace-separated pattern such as `ii-7 V7 I*`.
 *
 * Exact elements match one canonical token verbatim. A trailing `*` turns an
 * element into a family wildcard: `I*` (major family), `V7*` (dominant
 * sevenths), `ii*` (minor family, including minor-major sevenths).
 *
 * @throws PatternSyntaxError for the first malformed token
 */
export function compilePattern(text: string, options: TokenOptions = {}): CompiledPattern {
  const parts = text.trim().split(/\s+/).filter((t) => t.length > 0);
  if (parts.length === 0) {
    throw new PatternSyntaxError('', text, 'pattern is empty');
  }
  return {
    source: text.trim(),
    tokens: parts.map((part) => compileToken(part, text, options)),
  };
}

// ============================================================
// Matching
// ============================================================

export type Candidate = Pick<SequenceEntry, 'token' | 'quality'>;

/** Candidate built from token text alone, quality inferred by `readToken` */
export function candidateFromToken(token: string): Candidate {
  return { token, quality: readToken(token)?.quality ?? 'Unresolved' };
}

/**
 * Whether a candidate belongs to the family of a wildcard element.
 * Accidental and degree (including its case) must be identical.
 */
export function matchesFamily(patternToken: PatternToken, candidate: Candidate): boolean {
  if (!patternToken.family) return false;
  const parsed = readToken(candidate.token);
  if (!parsed) return false;
  if (parsed.accidental !== patternToken.accidental || parsed.degree !== patternToken.degree) {
    return false;
  }
  return FAMILY_QUALITIES[patternToken.family].has(candidate.quality);
}

/**
 * Element-wise match: family test for wildcards, string equality otherwise.
 */
export function matchesElement(patternToken: PatternToken, candidate: Candidate): boolean {
  if (patternToken.isWildcard) return matchesFamily(patternToken, candidate);
  return candidate.token === patternToken.text;
}
