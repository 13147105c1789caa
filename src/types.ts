// ============================================================
// Score (subset read from MusicXML)
// ============================================================
export interface Score {
  metadata: ScoreMetadata;
  parts: Part[];
}

export interface ScoreMetadata {
  workTitle?: string;
  movementTitle?: string;
}

export interface Part {
  id: string;
  measures: Measure[];
}

export interface Measure {
  number: string; // token type in MusicXML ("12", "12a")
  attributes?: MeasureAttributes;
  entries: MeasureEntry[];
}

export interface MeasureAttributes {
  divisions?: number;
  key?: KeySignature;
}

export interface KeySignature {
  fifths: number;
  mode?: string;
}

export type MeasureEntry = NoteEntry | BackupEntry | ForwardEntry | HarmonyEntry | AttributesEntry;

export interface NoteEntry {
  type: 'note';
  duration: number;
  /** Absent for rests and unpitched notes */
  pitch?: Pitch;
  chord?: boolean;
  grace?: boolean;
}

export interface Pitch {
  step: string;
  alter?: number;
}

export interface BackupEntry {
  type: 'backup';
  duration: number;
}

export interface ForwardEntry {
  type: 'forward';
  duration: number;
}

export interface AttributesEntry {
  type: 'attributes';
  attributes: MeasureAttributes;
}

export interface HarmonyEntry {
  type: 'harmony';
  root: {
    rootStep: string;
    rootAlter?: number;
  };
  kind: string;
  kindText?: string;
  bass?: {
    bassStep: string;
    bassAlter?: number;
  };
  degrees?: HarmonyDegree[];
  offset?: number;
}

export interface HarmonyDegree {
  degreeValue: number;
  degreeAlter?: number;
  degreeType: 'add' | 'alter' | 'subtract';
}

// ============================================================
// Harmonic function
// ============================================================

export type Mode = 'major' | 'minor';

export interface KeyDescriptor {
  /** Tonic spelled with b/# ("Eb", "F#") */
  tonic: string;
  mode: Mode;
  source: 'written' | 'declared' | 'analyzed';
}

/**
 * One chord symbol of a piece, as handed over by the score reader and the
 * harmonic-analysis step.
 */
export interface ChordEvent {
  barNumber: number;
  /** Position inside the bar, in quarter notes */
  offset: number;
  sequenceIndex: number;
  literalText: string;
  /** Scale-degree head with optional accidental ("bVII", "vi") */
  rawDegreeHead: string;
  rawQualityTail: string;
}

export const QUALITIES = [
  'MajorPlain',
  'MajorSix',
  'MajorMaj7',
  'MajorSixNine',
  'Dominant7',
  'MinorTriad',
  'MinorSix',
  'MinorSeven',
  'MinorMaj7',
  'Diminished7',
  'HalfDiminished7',
  'Unresolved',
] as const;

export type Quality = (typeof QUALITIES)[number];

export type DegreeAccidental = '' | 'b' | '#';

export type SixNineStyle = '69' | '6/9';

export interface TokenOptions {
  /** Rendering of major 6/9 chords (default: "69") */
  sixNineStyle?: SixNineStyle;
}

/** A canonical token together with the chord it was built from */
export interface SequenceEntry {
  bar: number;
  token: string;
  literal: string;
  quality: Quality;
}

export type DiagnosticCode = 'UNRESOLVED_QUALITY' | 'UNCANONICAL_DEGREE';

export interface Diagnostic {
  code: DiagnosticCode;
  bar: number;
  literal: string;
  message: string;
}

// ============================================================
// Patterns
// ============================================================

export type Family = 'major' | 'minor' | 'dominant7';

export interface PatternToken {
  /** Token as it appears in the compiled pattern (6/9 spelling normalized) */
  text: string;
  accidental: DegreeAccidental;
  degree: string;
  exactSuffix?: string;
  isWildcard: boolean;
  /** Set on wildcard elements only */
  family?: Family;
}

export interface CompiledPattern {
  source: string;
  tokens: PatternToken[];
}

export interface MatchHit {
  startBar: number;
  startIndex: number;
  matchedTokens: string[];
  matchedLiterals: string[];
}
