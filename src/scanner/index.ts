import { matchesElement } from '../pattern';
import type { CompiledPattern, MatchHit, PatternToken, SequenceEntry } from '../types';

/**
 * Slide a window of the pattern's length over the sequence and report every
 * start index where all elements match.
 *
 * Windows are contiguous: unresolved (empty) tokens are not skipped and only
 * match an element that equals them exactly. Overlapping hits are all kept.
 */
export function scan(
  sequence: readonly SequenceEntry[],
  pattern: CompiledPattern | readonly PatternToken[]
): MatchHit[] {
  const tokens = 'tokens' in pattern ? pattern.tokens : pattern;
  const hits: MatchHit[] = [];
  const n = tokens.length;
  if (n === 0) return hits;

  for (let i = 0; i + n <= sequence.length; i++) {
    const window = sequence.slice(i, i + n);
    if (!window.every((entry, j) => matchesElement(tokens[j], entry))) continue;

    hits.push({
      startBar: window[0].bar,
      startIndex: i,
      matchedTokens: window.map((entry) => entry.token),
      matchedLiterals: window.map((entry) => entry.literal),
    });
  }

  return hits;
}
