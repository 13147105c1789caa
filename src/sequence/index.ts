import { normalizeLiteral } from '../literal';
import { classify } from '../classifier';
import { buildToken, parseDegreeHead } from '../token';
import type { ChordEvent, Diagnostic, Quality, SequenceEntry, TokenOptions } from '../types';

export interface CanonicalChord {
  token: string;
  literal: string;
  quality: Quality;
  diagnostic?: Diagnostic;
}

/**
 * Run one chord event through normalization, classification and token building.
 *
 * Chords that cannot be canonicalized still produce an entry (a degree-only
 * token, or the raw figure) so that bar positions around them stay aligned.
 */
export function canonicalizeEvent(event: ChordEvent, options: TokenOptions = {}): CanonicalChord {
  const literal = normalizeLiteral(event.literalText);
  const head = event.rawDegreeHead.replace(/\s+/g, '');

  if (!parseDegreeHead(head)) {
    const figure = `${head}${event.rawQualityTail}`;
    return {
      token: figure,
      literal,
      quality: 'Unresolved',
      diagnostic: {
        code: 'UNCANONICAL_DEGREE',
        bar: event.barNumber,
        literal,
        message: figure
          ? `Degree "${figure}" is outside I..VII`
          : 'No degree could be determined',
      },
    };
  }

  const quality = classify(literal, event.rawQualityTail, head);
  const token = buildToken(head, quality, literal, options);
  if (quality !== 'Unresolved') {
    return { token, literal, quality };
  }

  return {
    token,
    literal,
    quality,
    diagnostic: {
      code: 'UNRESOLVED_QUALITY',
      bar: event.barNumber,
      literal,
      message: `Quality of "${literal || head + event.rawQualityTail}" could not be determined`,
    },
  };
}

export function compareEvents(a: ChordEvent, b: ChordEvent): number {
  return a.barNumber - b.barNumber || a.offset - b.offset || a.sequenceIndex - b.sequenceIndex;
}

export interface PieceSequence {
  entries: SequenceEntry[];
  diagnostics: Diagnostic[];
}

/**
 * Order a piece's chord events by (bar, offset, sequence index) and turn
 * them into the token sequence the scanner works on.
 */
export function buildSequence(events: readonly ChordEvent[], options: TokenOptions = {}): PieceSequence {
  const entries: SequenceEntry[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const event of [...events].sort(compareEvents)) {
    const chord = canonicalizeEvent(event, options);
    entries.push({
      bar: event.barNumber,
      token: chord.token,
      literal: chord.literal,
      quality: chord.quality,
    });
    if (chord.diagnostic) diagnostics.push(chord.diagnostic);
  }

  return { entries, diagnostics };
}
