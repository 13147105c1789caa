import { strFromU8, unzipSync } from 'fflate';
import type { Unzipped } from 'fflate';
import { parse } from './importers/musicxml';
import type { Score } from './types';

const CONTAINER_PATH = 'META-INF/container.xml';
const ROOT_FILE = /<rootfile\b[^>]*\bfull-path="([^"]+)"/;
const FALLBACK_ROOT_FILES = ['score.xml', 'musicxml.xml'];

function isScoreEntry(name: string): boolean {
  return !name.startsWith('META-INF/') && /\.(?:xml|musicxml)$/i.test(name);
}

/**
 * Archive entry holding the score: the container's root file, else the only
 * XML entry, else one of the conventional names.
 */
function rootFileOf(files: Unzipped): string | undefined {
  const container = files[CONTAINER_PATH];
  if (container) {
    const declared = ROOT_FILE.exec(strFromU8(container))?.[1];
    if (declared && files[declared]) return declared;
  }

  const candidates = Object.keys(files).filter(isScoreEntry);
  if (candidates.length === 1) return candidates[0];
  return FALLBACK_ROOT_FILES.find((name) => files[name] !== undefined);
}

/**
 * Read a score from `.mxl` archive bytes.
 * @throws Error when the archive holds no score document
 */
export function parseCompressed(data: Uint8Array): Score {
  const files = unzipSync(data);
  const rootFile = rootFileOf(files);
  if (!rootFile) {
    throw new Error('Could not find MusicXML file in compressed archive');
  }
  return parse(strFromU8(files[rootFile]));
}

/** ZIP local-file header magic ("PK") */
export function isCompressed(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x50 && data[1] === 0x4b;
}

/**
 * Read a score from XML text, XML bytes or `.mxl` archive bytes.
 */
export function parseAuto(data: Uint8Array | string): Score {
  if (typeof data === 'string') return parse(data);
  return isCompressed(data) ? parseCompressed(data) : parse(strFromU8(data));
}
