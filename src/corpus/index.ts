import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import { parseFile } from '../file';
import { extractChordEvents, resolveKey, scoreTitle } from '../analysis';
import { buildSequence } from '../sequence';
import { scan } from '../scanner';
import type {
  CompiledPattern,
  Diagnostic,
  KeyDescriptor,
  MatchHit,
  Score,
  SequenceEntry,
  TokenOptions,
} from '../types';

export const SCORE_EXTENSIONS = ['.musicxml', '.xml', '.mxl'];

function isScorePath(path: string): boolean {
  return SCORE_EXTENSIONS.includes(extname(path).toLowerCase());
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, out);
    } else if (entry.isFile() && isScorePath(path)) {
      out.push(path);
    }
  }
}

function compareScorePaths(a: string, b: string): number {
  const nameA = basename(a).toLowerCase();
  const nameB = basename(b).toLowerCase();
  if (nameA !== nameB) return nameA < nameB ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Score files under a path: the file itself when it has a score extension,
 * or every score file below a directory, ordered by file name.
 */
export async function listScorePaths(path: string): Promise<string[]> {
  const info = await stat(path);
  if (info.isFile()) {
    return isScorePath(path) ? [path] : [];
  }
  const found: string[] = [];
  await walk(path, found);
  return found.sort(compareScorePaths);
}

// ============================================================
// Pieces
// ============================================================

export interface PatternMatches {
  pattern: CompiledPattern;
  hits: MatchHit[];
}

export interface PieceReading {
  path: string;
  title: string;
  key: KeyDescriptor;
  sequence: SequenceEntry[];
  diagnostics: Diagnostic[];
}

export interface PieceResult extends PieceReading {
  matches: PatternMatches[];
}

export interface PieceFailure {
  path: string;
  message: string;
}

export interface PieceOptions extends TokenOptions {
  /** Declared key, used instead of the written key signature */
  key?: KeyDescriptor;
}

function fileStem(path: string): string {
  return basename(path, extname(path));
}

/**
 * Turn a parsed score into its key and canonical token sequence.
 */
export function readScore(score: Score, path: string, options: PieceOptions = {}): PieceReading {
  const key = resolveKey(score, options.key);
  const events = extractChordEvents(score, key);
  const { entries, diagnostics } = buildSequence(events, options);
  return {
    path,
    title: scoreTitle(score) ?? fileStem(path),
    key,
    sequence: entries,
    diagnostics,
  };
}

export async function readPiece(path: string, options: PieceOptions = {}): Promise<PieceReading> {
  const score = await parseFile(path);
  return readScore(score, path, options);
}

/**
 * Read one piece and scan it for every pattern.
 */
export async function scanPiece(
  path: string,
  patterns: readonly CompiledPattern[],
  options: PieceOptions = {}
): Promise<PieceResult> {
  const reading = await readPiece(path, options);
  return {
    ...reading,
    matches: patterns.map((pattern) => ({ pattern, hits: scan(reading.sequence, pattern) })),
  };
}

// ============================================================
// Corpus
// ============================================================

export type PieceOutcome =
  | { ok: true; result: PieceResult }
  | { ok: false; failure: PieceFailure };

export interface CorpusOptions extends PieceOptions {
  /** Pieces read at the same time (default: 4) */
  concurrency?: number;
}

export interface CorpusResult {
  /** One outcome per path, in the order the paths were given */
  outcomes: PieceOutcome[];
  results: PieceResult[];
  failures: PieceFailure[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Scan every piece for every pattern.
 *
 * Pieces are processed by a bounded pool of workers; outcomes are stored by
 * path index so the result order never depends on scheduling. A piece that
 * cannot be read becomes a failure and the scan goes on.
 */
export async function scanCorpus(
  paths: readonly string[],
  patterns: readonly CompiledPattern[],
  options: CorpusOptions = {}
): Promise<CorpusResult> {
  const outcomes: PieceOutcome[] = new Array(paths.length);
  const workerCount = Math.max(1, Math.min(options.concurrency ?? 4, paths.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < paths.length) {
      const index = next++;
      const path = paths[index];
      try {
        outcomes[index] = { ok: true, result: await scanPiece(path, patterns, options) };
      } catch (error) {
        outcomes[index] = { ok: false, failure: { path, message: errorMessage(error) } };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const results: PieceResult[] = [];
  const failures: PieceFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) results.push(outcome.result);
    else failures.push(outcome.failure);
  }

  return { outcomes, results, failures };
}
