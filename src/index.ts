// Core types
export type {
  Score,
  ScoreMetadata,
  Part,
  Measure,
  MeasureAttributes,
  MeasureEntry,
  NoteEntry,
  Pitch,
  BackupEntry,
  ForwardEntry,
  AttributesEntry,
  HarmonyEntry,
  HarmonyDegree,
  KeySignature,
  Mode,
  KeyDescriptor,
  ChordEvent,
  Quality,
  DegreeAccidental,
  SixNineStyle,
  TokenOptions,
  SequenceEntry,
  Diagnostic,
  DiagnosticCode,
  Family,
  PatternToken,
  CompiledPattern,
  MatchHit,
} from './types';
export { QUALITIES } from './types';

// Token engine
export { normalizeLiteral } from './literal';
export {
  classify,
  classifyQualityTail,
  cleanQualityTail,
  matchingRule,
  splitLiteral,
  QUALITY_RULES,
} from './classifier';
export type { QualityRule, LiteralParts } from './classifier';
export {
  buildToken,
  qualitySuffix,
  detectTensions,
  parseDegreeHead,
  readToken,
} from './token';
export type { DegreeHead, ParsedToken } from './token';
export { canonicalizeEvent, buildSequence, compareEvents } from './sequence';
export type { CanonicalChord, PieceSequence } from './sequence';

// Patterns
export {
  compilePattern,
  familyOf,
  matchesFamily,
  matchesElement,
  candidateFromToken,
  PatternSyntaxError,
  FAMILY_QUALITIES,
} from './pattern';
export type { Candidate } from './pattern';
export { scan } from './scanner';

// Scores
export { parse } from './importers/musicxml';
export { parseCompressed, isCompressed, parseAuto } from './compressed';
export { parseFile } from './file';
export {
  analyzeHarmony,
  degreeOf,
  estimateKey,
  extractChordEvents,
  findWrittenKey,
  harmonyLiteral,
  keyFromSignature,
  parseKeyArg,
  pitchClassWeights,
  prettyKeyName,
  resolveKey,
  scoreTitle,
} from './analysis';
export type { RomanAnalysis } from './analysis';

// Corpus
export {
  listScorePaths,
  readScore,
  readPiece,
  scanPiece,
  scanCorpus,
  SCORE_EXTENSIONS,
} from './corpus';
export type {
  PatternMatches,
  PieceReading,
  PieceResult,
  PieceFailure,
  PieceOptions,
  PieceOutcome,
  CorpusOptions,
  CorpusResult,
} from './corpus';

// Output
export { toCsv, hitRows, CSV_COLUMNS } from './exporters/csv';
export type { CsvOptions } from './exporters/csv';
export {
  formatChart,
  formatDiagnostic,
  formatFailure,
  formatHit,
  formatPieceReport,
} from './exporters/console';

// Configuration
export { scanConfigSchema, configFileSchema, loadConfigFile, resolveConfig, ConfigError } from './config';
export type { ScanConfig, ScanConfigInput, ConfigFile } from './config';
