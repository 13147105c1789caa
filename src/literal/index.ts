// E-→Eb, F+→F# when the sign directly follows a root letter that starts a word
const ROOT_PLUS_MINUS = /(?<![A-Za-z])([A-Ga-g])([+-])(?=$|[/\s(\d])/g;

const SUS4_VARIANTS: RegExp[] = [
  /add\s*4\s*(?:subtract|minus|no|omit)\s*3(?!\d)/gi,
  /add\s*11\s*(?:no|omit)\s*3(?!\d)/gi,
  /sus\s*4(?!\d)/gi,
];

const REPEATED_SUS4 = /sus4(?:\s*sus4)+/gi;

function rootPlusMinusToAccidental(text: string): string {
  return text.replace(ROOT_PLUS_MINUS, (_match, note: string, sign: string) =>
    `${note}${sign === '-' ? 'b' : '#'}`
  );
}

function normalizeSus4(text: string): string {
  let s = text;
  for (const pattern of SUS4_VARIANTS) {
    s = s.replace(pattern, 'sus4');
  }
  return s.replace(REPEATED_SUS4, 'sus4');
}

/**
 * Clean a chord-symbol literal into its canonical written form.
 *
 * - trims surrounding whitespace
 * - spells root accidentals with b/# (`E-` → `Eb`, `F+` → `F#`)
 * - folds suspension phrasings (`add4 no3`, `sus 4`, `sus4 sus4`) to `sus4`
 * - collapses runs of spaces
 *
 * @example
 * normalizeLiteral('  B-7 ') // 'Bb7'
 * normalizeLiteral('Cadd4 subtract3') // 'Csus4'
 */
export function normalizeLiteral(raw: string): string {
  if (!raw) return '';
  let s = raw.trim();
  s = rootPlusMinusToAccidental(s);
  s = normalizeSus4(s);
  return s.replace(/ {2,}/g, ' ');
}
