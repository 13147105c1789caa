import { Key, Note } from 'tonal';
import type { ChordEvent, HarmonyEntry, KeyDescriptor, KeySignature, Mode, Score } from '../types';

// ============================================================
// Keys
// ============================================================

const MINOR_MODES = new Set(['minor', 'aeolian']);

/**
 * Key named by a written key signature. Church modes other than aeolian are
 * read as the major key of the same signature.
 */
export function keyFromSignature(signature: KeySignature): KeyDescriptor {
  const mode: Mode = signature.mode && MINOR_MODES.has(signature.mode) ? 'minor' : 'major';
  const tonic = Note.transposeFifths(mode === 'minor' ? 'A' : 'C', signature.fifths);
  return { tonic, mode, source: 'written' };
}

/**
 * First key signature written in the score, in part then measure order.
 */
export function findWrittenKey(score: Score): KeySignature | undefined {
  for (const part of score.parts) {
    for (const measure of part.measures) {
      if (measure.attributes?.key) return measure.attributes.key;
      for (const entry of measure.entries) {
        if (entry.type === 'attributes' && entry.attributes.key) return entry.attributes.key;
      }
    }
  }
  return undefined;
}

/**
 * Key used to read a piece: an explicitly declared key, else the written
 * key signature, else a key estimated from the pitches.
 * @throws Error when none is available
 */
export function resolveKey(score: Score, declared?: KeyDescriptor): KeyDescriptor {
  if (declared) return declared;
  const written = findWrittenKey(score);
  if (written) return keyFromSignature(written);
  const estimated = estimateKey(score);
  if (!estimated) {
    throw new Error('No key signature or pitched notes found; declare a key explicitly');
  }
  return estimated;
}

/**
 * Parse a key given on the command line or in a config file.
 * Accepts `C`, `Eb`, `A-` (`-` means flat), `F#`, `C minor`, `eb major`.
 * A single lowercase tonic (`c`, `f#`) means minor.
 */
export function parseKeyArg(text: string): KeyDescriptor {
  const parts = text.trim().replace(/-/g, 'b').split(/\s+/).filter((p) => p.length > 0);
  if (parts.length === 0 || parts.length > 2) {
    throw new Error(`Unrecognized key string: ${text}`);
  }

  const [tonicText, modeText] = parts;
  const note = Note.get(tonicText);
  if (note.empty || note.oct !== undefined) {
    throw new Error(`Unrecognized key tonic: ${tonicText}`);
  }

  let mode: Mode;
  if (modeText === undefined) {
    mode = tonicText[0] === tonicText[0].toLowerCase() ? 'minor' : 'major';
  } else {
    const lowered = modeText.toLowerCase();
    if (lowered !== 'major' && lowered !== 'minor') {
      throw new Error(`Unrecognized key mode: ${modeText}`);
    }
    mode = lowered;
  }

  return { tonic: note.pc, mode, source: 'declared' };
}

/** `"<Tonic> <mode>"` with the tonic spelled using b/# */
export function prettyKeyName(key: KeyDescriptor): string {
  const tonic = key.tonic.replace(/-/g, 'b').replace(/\+/g, '#');
  return `${tonic} ${key.mode}`;
}

// ============================================================
// Key estimation
// ============================================================

// Krumhansl-Kessler key profiles, tonic first
const MAJOR_PROFILE = [6.35, 2.23, 3.48, 2.33, 4.38, 4.09, 2.52, 5.19, 2.39, 3.66, 2.29, 2.88];
const MINOR_PROFILE = [6.33, 2.68, 3.52, 5.38, 2.6, 3.53, 2.54, 4.75, 3.98, 2.69, 3.34, 3.17];

const MODES: readonly Mode[] = ['major', 'minor'];

/**
 * Sounding time of each pitch class (index = chroma, C = 0) in quarter notes,
 * summed over all parts. Grace notes have no duration and add nothing.
 */
export function pitchClassWeights(score: Score): number[] {
  const weights = new Array<number>(12).fill(0);

  for (const part of score.parts) {
    let divisions = 1;
    for (const measure of part.measures) {
      if (measure.attributes?.divisions) divisions = measure.attributes.divisions;
      for (const entry of measure.entries) {
        if (entry.type === 'attributes' && entry.attributes.divisions) {
          divisions = entry.attributes.divisions;
        } else if (entry.type === 'note' && entry.pitch) {
          const chroma = Note.chroma(noteName(entry.pitch.step, entry.pitch.alter));
          if (chroma !== undefined) weights[chroma] += entry.duration / divisions;
        }
      }
    }
  }

  return weights;
}

function correlation(xs: readonly number[], ys: readonly number[]): number {
  const mean = (values: readonly number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;
  const mx = mean(xs);
  const my = mean(ys);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  xs.forEach((x, i) => {
    const dx = x - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  });
  return sxx === 0 || syy === 0 ? 0 : sxy / Math.sqrt(sxx * syy);
}

/** Tonic as its key signature spells it: majors Db to F#, minors Eb to G# */
function spellTonic(chroma: number, mode: Mode): string {
  const home = mode === 'major' ? 'C' : 'A';
  const homeChroma = mode === 'major' ? 0 : 9;
  const mostSharps = mode === 'major' ? 6 : 5;
  // 7 semitones per fifth, and 7 * 7 = 49 = 1 (mod 12)
  const fifths = (((chroma - homeChroma + 12) % 12) * 7) % 12;
  return Note.transposeFifths(home, fifths > mostSharps ? fifths - 12 : fifths);
}

/**
 * Estimate the key of a piece from its pitches: the major or minor key whose
 * profile correlates best with the pitch-class weights. Ties go to the key
 * found first (majors before minors, tonics upward from C).
 * Returns undefined when the piece has no pitched notes.
 */
export function estimateKey(score: Score): KeyDescriptor | undefined {
  const weights = pitchClassWeights(score);
  if (weights.every((w) => w === 0)) return undefined;

  let best: KeyDescriptor | undefined;
  let bestScore = -Infinity;
  for (const mode of MODES) {
    const profile = mode === 'major' ? MAJOR_PROFILE : MINOR_PROFILE;
    for (let tonic = 0; tonic < 12; tonic++) {
      const rotated = weights.map((_, pc) => profile[(pc - tonic + 12) % 12]);
      const r = correlation(weights, rotated);
      if (r > bestScore) {
        bestScore = r;
        best = { tonic: spellTonic(tonic, mode), mode, source: 'analyzed' };
      }
    }
  }
  return best;
}

// ============================================================
// Chord kinds
// ============================================================

interface KindInfo {
  /** Chord-symbol spelling */
  abbr: string;
  /** Minor or diminished third: lowercase degree */
  minor: boolean;
  /** Quality tail appended to the degree */
  tail: string;
  seventh: boolean;
}

const KINDS: Record<string, KindInfo> = {
  major: { abbr: '', minor: false, tail: '', seventh: false },
  minor: { abbr: 'm', minor: true, tail: '', seventh: false },
  augmented: { abbr: 'aug', minor: false, tail: '+', seventh: false },
  diminished: { abbr: 'dim', minor: true, tail: 'o', seventh: false },
  dominant: { abbr: '7', minor: false, tail: '7', seventh: true },
  'major-seventh': { abbr: 'maj7', minor: false, tail: 'maj7', seventh: true },
  'minor-seventh': { abbr: 'm7', minor: true, tail: '7', seventh: true },
  'diminished-seventh': { abbr: 'dim7', minor: true, tail: 'o7', seventh: true },
  'augmented-seventh': { abbr: 'aug7', minor: false, tail: '+7', seventh: true },
  'half-diminished': { abbr: 'm7b5', minor: true, tail: 'ø7', seventh: true },
  'major-minor': { abbr: 'm(maj7)', minor: true, tail: 'maj7', seventh: true },
  'major-sixth': { abbr: '6', minor: false, tail: 'add6', seventh: false },
  'minor-sixth': { abbr: 'm6', minor: true, tail: 'add6', seventh: false },
  'dominant-ninth': { abbr: '9', minor: false, tail: '7', seventh: true },
  'major-ninth': { abbr: 'maj9', minor: false, tail: 'maj7', seventh: true },
  'minor-ninth': { abbr: 'm9', minor: true, tail: '7', seventh: true },
  'dominant-11th': { abbr: '11', minor: false, tail: '7', seventh: true },
  'major-11th': { abbr: 'maj11', minor: false, tail: 'maj7', seventh: true },
  'minor-11th': { abbr: 'm11', minor: true, tail: '7', seventh: true },
  'dominant-13th': { abbr: '13', minor: false, tail: '7', seventh: true },
  'major-13th': { abbr: 'maj13', minor: false, tail: 'maj7', seventh: true },
  'minor-13th': { abbr: 'm13', minor: true, tail: '7', seventh: true },
  'suspended-second': { abbr: 'sus2', minor: false, tail: '', seventh: false },
  'suspended-fourth': { abbr: 'sus4', minor: false, tail: '', seventh: false },
  power: { abbr: '5', minor: false, tail: '', seventh: false },
  pedal: { abbr: 'pedal', minor: false, tail: '', seventh: false },
  Neapolitan: { abbr: 'N6', minor: false, tail: '', seventh: false },
  Italian: { abbr: 'It+6', minor: false, tail: '', seventh: false },
  French: { abbr: 'Fr+6', minor: false, tail: '', seventh: false },
  German: { abbr: 'Ger+6', minor: false, tail: '', seventh: false },
  Tristan: { abbr: 'Tristan', minor: false, tail: '', seventh: false },
};

const UNKNOWN_KIND: KindInfo = { abbr: '', minor: false, tail: '', seventh: false };

const NUMERALS = ['I', 'II', 'III', 'IV', 'V', 'VI', 'VII'];

function kindInfo(kind: string): KindInfo {
  return KINDS[kind] ?? UNKNOWN_KIND;
}

function alterSigns(alter: number | undefined): string {
  const n = Math.round(alter ?? 0);
  return n < 0 ? 'b'.repeat(-n) : '#'.repeat(n);
}

function noteName(step: string, alter: number | undefined): string {
  return `${step.toUpperCase()}${alterSigns(alter)}`;
}

// ============================================================
// Literal
// ============================================================

// A leading jazz sign would read as a root accidental once the literal is normalized
function kindSpelling(harmony: HarmonyEntry): string {
  const text = harmony.kindText;
  if (text === undefined) return kindInfo(harmony.kind).abbr;
  if (text.startsWith('-')) return `m${text.slice(1)}`;
  if (text.startsWith('+')) return `aug${text.slice(1)}`;
  return text;
}

/**
 * Chord-symbol text of a harmony element: root, kind text or kind
 * abbreviation, degree alterations, slash bass.
 *
 * @example
 * // <root-step>D</root-step><kind text="-7">minor-seventh</kind>
 * harmonyLiteral(h) // 'Dm7'
 */
export function harmonyLiteral(harmony: HarmonyEntry): string {
  if (harmony.kind === 'none') return harmony.kindText || 'N.C.';

  const root = noteName(harmony.root.rootStep, harmony.root.rootAlter);

  const degrees = (harmony.degrees ?? []).map((d) => {
    const acc = alterSigns(d.degreeAlter);
    switch (d.degreeType) {
      case 'add':
        return `add${acc}${d.degreeValue}`;
      case 'alter':
        return `${acc}${d.degreeValue}`;
      case 'subtract':
        return `subtract${d.degreeValue}`;
    }
  });

  const bass = harmony.bass ? `/${noteName(harmony.bass.bassStep, harmony.bass.bassAlter)}` : '';

  return `${root}${kindSpelling(harmony)}${degrees.join(' ')}${bass}`;
}

// ============================================================
// Degree and quality relative to a key
// ============================================================

export interface RomanAnalysis {
  rawDegreeHead: string;
  rawQualityTail: string;
}

function scaleOf(key: KeyDescriptor): readonly string[] {
  return key.mode === 'major' ? Key.majorKey(key.tonic).scale : Key.minorKey(key.tonic).natural.scale;
}

/**
 * Accidental and numeral of a root relative to the key's scale. In minor,
 * the raised seventh counts as diatonic.
 */
export function degreeOf(rootName: string, key: KeyDescriptor): string | undefined {
  const root = Note.get(rootName);
  const tonic = Note.get(key.tonic);
  if (root.empty || tonic.empty || root.step === undefined || tonic.step === undefined) {
    return undefined;
  }

  const index = (root.step - tonic.step + 7) % 7;
  const expected = Note.chroma(scaleOf(key)[index] ?? '');
  if (expected === undefined || root.chroma === undefined) return undefined;

  let diff = ((root.chroma - expected + 18) % 12) - 6;
  if (key.mode === 'minor' && index === 6 && diff === 1) diff = 0;

  const accidental = diff < 0 ? 'b'.repeat(-diff) : '#'.repeat(diff);
  return `${accidental}${NUMERALS[index]}`;
}

function inversionFigure(harmony: HarmonyEntry, seventh: boolean): string {
  if (!harmony.bass) return '';
  const root = Note.get(harmony.root.rootStep);
  const bass = Note.get(harmony.bass.bassStep);
  if (root.step === undefined || bass.step === undefined) return '';

  switch ((bass.step - root.step + 7) % 7) {
    case 2:
      return seventh ? '65' : '63';
    case 4:
      return seventh ? '43' : '64';
    case 6:
      return seventh ? '42' : '';
    default:
      return '';
  }
}

/**
 * Roman-numeral reading of a harmony element in a key: degree head (case
 * from the chord's third) and quality tail with figured-bass inversion digits.
 * Returns empty strings for "no chord".
 */
export function analyzeHarmony(harmony: HarmonyEntry, key: KeyDescriptor): RomanAnalysis {
  if (harmony.kind === 'none') return { rawDegreeHead: '', rawQualityTail: '' };

  const info = kindInfo(harmony.kind);
  const degree = degreeOf(noteName(harmony.root.rootStep, harmony.root.rootAlter), key);
  if (!degree) return { rawDegreeHead: '', rawQualityTail: '' };

  const figure = inversionFigure(harmony, info.seventh);
  const rawQualityTail = info.seventh && figure ? info.tail.replace('7', figure) : `${info.tail}${figure}`;

  return {
    rawDegreeHead: info.minor ? degree.toLowerCase() : degree,
    rawQualityTail,
  };
}

// ============================================================
// Events
// ============================================================

function barNumber(measureNumber: string): number {
  const n = parseInt(measureNumber, 10);
  return Number.isNaN(n) ? 0 : n;
}

/**
 * Every harmony element of the score as a chord event, with its bar and its
 * position in the bar in quarter notes. Parts are read one after the other;
 * `sequenceIndex` follows document order.
 */
export function extractChordEvents(score: Score, key: KeyDescriptor): ChordEvent[] {
  const events: ChordEvent[] = [];
  let sequenceIndex = 0;

  for (const part of score.parts) {
    let divisions = 1;

    for (const measure of part.measures) {
      if (measure.attributes?.divisions) divisions = measure.attributes.divisions;
      const bar = barNumber(measure.number);
      let position = 0;

      for (const entry of measure.entries) {
        switch (entry.type) {
          case 'attributes':
            if (entry.attributes.divisions) divisions = entry.attributes.divisions;
            break;
          case 'note':
            if (!entry.chord && !entry.grace) position += entry.duration;
            break;
          case 'backup':
            position = Math.max(0, position - entry.duration);
            break;
          case 'forward':
            position += entry.duration;
            break;
          case 'harmony': {
            const analysis = analyzeHarmony(entry, key);
            events.push({
              barNumber: bar,
              offset: (position + (entry.offset ?? 0)) / divisions,
              sequenceIndex: sequenceIndex++,
              literalText: harmonyLiteral(entry),
              ...analysis,
            });
            break;
          }
        }
      }
    }
  }

  return events;
}

/** Work title, else movement title */
export function scoreTitle(score: Score): string | undefined {
  return score.metadata.workTitle || score.metadata.movementTitle || undefined;
}
