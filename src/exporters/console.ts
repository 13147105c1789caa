import { basename, extname } from 'path';
import { prettyKeyName } from '../analysis';
import type { PieceFailure, PieceReading, PieceResult } from '../corpus';
import type { Diagnostic, MatchHit } from '../types';

function stem(path: string): string {
  return basename(path, extname(path));
}

export function formatHit(hit: MatchHit, showLiterals = false): string {
  let line = `  → bar ${hit.startBar}: ${hit.matchedTokens.join(' ')}`;
  if (showLiterals) line += `  |  ${hit.matchedLiterals.join(' | ')}`;
  return line;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `  ! bar ${diagnostic.bar}: ${diagnostic.message}`;
}

/**
 * Verbose console lines for one piece: per pattern a hit count followed by
 * one line per hit.
 */
export function formatPieceReport(piece: PieceResult, showLiterals = false): string[] {
  const lines: string[] = [];
  const name = stem(piece.path);
  for (const { pattern, hits } of piece.matches) {
    lines.push(`✓ ${name} [${pattern.source}]: ${hits.length} hit(s)`);
    for (const hit of hits) {
      lines.push(formatHit(hit, showLiterals));
    }
  }
  return lines;
}

export function formatFailure(failure: PieceFailure): string {
  return `× ${stem(failure.path)}: ERROR (${failure.message})`;
}

/**
 * Chart of a piece: key line, then one line per chord with its bar, token
 * and literal.
 */
export function formatChart(piece: PieceReading): string[] {
  const lines = [`Key: ${prettyKeyName(piece.key)} (${piece.key.source})`];
  for (const entry of piece.sequence) {
    lines.push(`m ${String(entry.bar).padStart(3)}: ${entry.token.padEnd(8)} (${entry.literal})`);
  }
  return lines;
}
