import { stringify } from 'csv-stringify/sync';
import { prettyKeyName } from '../analysis';
import type { PieceResult } from '../corpus';

export interface CsvOptions {
  /** Add a Literals column (default: false) */
  showLiterals?: boolean;
}

export const CSV_COLUMNS = ['Title', 'Path', 'Key', 'BarStart', 'Pattern', 'Tokens'];

/**
 * One row per hit, in piece then pattern then hit order.
 */
export function hitRows(results: readonly PieceResult[], options: CsvOptions = {}): string[][] {
  const rows: string[][] = [];
  for (const piece of results) {
    const key = prettyKeyName(piece.key);
    for (const { pattern, hits } of piece.matches) {
      for (const hit of hits) {
        const row = [
          piece.title,
          piece.path,
          key,
          String(hit.startBar),
          pattern.source,
          hit.matchedTokens.join(' '),
        ];
        if (options.showLiterals) row.push(hit.matchedLiterals.join(' | '));
        rows.push(row);
      }
    }
  }
  return rows;
}

/**
 * Render hits as CSV with a header row
 */
export function toCsv(results: readonly PieceResult[], options: CsvOptions = {}): string {
  const header = options.showLiterals ? [...CSV_COLUMNS, 'Literals'] : CSV_COLUMNS;
  return stringify([header, ...hitRows(results, options)]);
}
