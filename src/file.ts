import { readFile } from 'fs/promises';
import { parseAuto } from './compressed';
import type { Score } from './types';

/**
 * Read a score from disk. Archives are recognized by their content, so a
 * `.mxl` saved as `.xml` still opens.
 */
export async function parseFile(path: string): Promise<Score> {
  return parseAuto(new Uint8Array(await readFile(path)));
}
