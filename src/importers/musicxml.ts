import { XMLParser } from 'fast-xml-parser';
import type {
  HarmonyDegree,
  HarmonyEntry,
  KeySignature,
  Measure,
  MeasureAttributes,
  MeasureEntry,
  NoteEntry,
  Part,
  Pitch,
  Score,
  ScoreMetadata,
} from '../types';

// preserveOrder keeps harmony elements between the notes they sit on
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  preserveOrder: true,
});

/** One node of fast-xml-parser's ordered output: `{ tag: children, ':@': attrs }` */
interface XmlNode {
  [tag: string]: unknown;
  ':@'?: Record<string, unknown>;
}

type XmlChildren = XmlNode[];

function isChildren(value: unknown): value is XmlChildren {
  return Array.isArray(value);
}

// ============================================================
// Node helpers
// ============================================================

/** Children of the first `tag` element, following nested tags in turn */
function child(nodes: XmlChildren, ...tags: string[]): XmlChildren | undefined {
  let current: XmlChildren | undefined = nodes;
  for (const tag of tags) {
    const found: XmlNode | undefined = current?.find((node) => isChildren(node[tag]));
    const next: unknown = found?.[tag];
    current = isChildren(next) ? next : undefined;
  }
  return current;
}

function textOf(nodes: XmlChildren): string | undefined {
  const textNode = nodes.find((node) => node['#text'] !== undefined);
  return textNode ? String(textNode['#text']) : undefined;
}

function childText(nodes: XmlChildren, ...tags: string[]): string | undefined {
  const found = child(nodes, ...tags);
  return found ? textOf(found) : undefined;
}

function childInt(nodes: XmlChildren, ...tags: string[]): number | undefined {
  const text = childText(nodes, ...tags);
  if (!text) return undefined;
  const n = parseInt(text, 10);
  return Number.isNaN(n) ? undefined : n;
}

function childFloat(nodes: XmlChildren, ...tags: string[]): number | undefined {
  const text = childText(nodes, ...tags);
  if (!text) return undefined;
  const n = parseFloat(text);
  return Number.isNaN(n) ? undefined : n;
}

function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[':@']?.[`@_${name}`];
  return value === undefined ? undefined : String(value);
}

/** Every `tag` element of a node list, with its node for attribute access */
function* elements(nodes: XmlChildren, tag: string): Generator<[XmlNode, XmlChildren]> {
  for (const node of nodes) {
    const content = node[tag];
    if (isChildren(content)) yield [node, content];
  }
}

// ============================================================
// Score
// ============================================================

/**
 * Read the parts of a score-partwise document that chord analysis needs:
 * titles, measure numbers, divisions, key signatures, note pitches, the
 * durations that move the time cursor, and harmony elements.
 *
 * @throws Error for documents that are not score-partwise
 */
export function parse(xmlString: string): Score {
  const document: unknown = xmlParser.parse(xmlString);
  const root = isChildren(document) ? child(document, 'score-partwise') : undefined;
  if (!root) {
    throw new Error('Unsupported MusicXML format: only score-partwise is supported');
  }

  return {
    metadata: readMetadata(root),
    parts: Array.from(elements(root, 'part'), ([node, content]) => readPart(node, content)),
  };
}

function readMetadata(root: XmlChildren): ScoreMetadata {
  const metadata: ScoreMetadata = {};
  const workTitle = childText(root, 'work', 'work-title');
  if (workTitle) metadata.workTitle = workTitle;
  const movementTitle = childText(root, 'movement-title');
  if (movementTitle) metadata.movementTitle = movementTitle;
  return metadata;
}

function readPart(node: XmlNode, content: XmlChildren): Part {
  return {
    id: attribute(node, 'id') ?? '',
    measures: Array.from(elements(content, 'measure'), ([measureNode, measureContent]) =>
      readMeasure(attribute(measureNode, 'number') ?? '0', measureContent)
    ),
  };
}

// ============================================================
// Measures
// ============================================================

function readMeasure(number: string, content: XmlChildren): Measure {
  const measure: Measure = { number, entries: [] };

  for (const node of content) {
    const entry = readEntry(node);
    if (!entry) continue;
    // The opening attributes block describes the measure; later ones change it mid-way
    if (entry.type === 'attributes' && !measure.attributes && measure.entries.length === 0) {
      measure.attributes = entry.attributes;
    } else {
      measure.entries.push(entry);
    }
  }

  return measure;
}

function readEntry(node: XmlNode): MeasureEntry | undefined {
  for (const [tag, value] of Object.entries(node)) {
    if (!isChildren(value)) continue;
    switch (tag) {
      case 'note':
        return readNote(value);
      case 'backup':
        return { type: 'backup', duration: childInt(value, 'duration') ?? 0 };
      case 'forward':
        return { type: 'forward', duration: childInt(value, 'duration') ?? 0 };
      case 'attributes':
        return { type: 'attributes', attributes: readAttributes(value) };
      case 'harmony':
        return readHarmony(value);
    }
  }
  return undefined;
}

function readNote(content: XmlChildren): NoteEntry {
  const note: NoteEntry = { type: 'note', duration: childInt(content, 'duration') ?? 0 };
  const pitch = child(content, 'pitch');
  if (pitch) note.pitch = readPitch(pitch);
  if (content.some((node) => node['chord'] !== undefined)) note.chord = true;
  if (content.some((node) => node['grace'] !== undefined)) note.grace = true;
  return note;
}

function readPitch(content: XmlChildren): Pitch {
  const pitch: Pitch = { step: childText(content, 'step') || 'C' };
  const alter = childFloat(content, 'alter');
  if (alter) pitch.alter = alter;
  return pitch;
}

function readAttributes(content: XmlChildren): MeasureAttributes {
  const attributes: MeasureAttributes = {};
  const divisions = childInt(content, 'divisions');
  if (divisions) attributes.divisions = divisions;
  // Multi-staff parts may carry one key per staff; the first one names the key
  const key = child(content, 'key');
  if (key) attributes.key = readKey(key);
  return attributes;
}

function readKey(content: XmlChildren): KeySignature {
  const key: KeySignature = { fifths: childInt(content, 'fifths') ?? 0 };
  const mode = childText(content, 'mode');
  if (mode) key.mode = mode;
  return key;
}

// ============================================================
// Harmony
// ============================================================

const DEGREE_TYPES = new Set<string>(['add', 'alter', 'subtract']);

function isDegreeType(value: string | undefined): value is HarmonyDegree['degreeType'] {
  return value !== undefined && DEGREE_TYPES.has(value);
}

function readHarmony(content: XmlChildren): HarmonyEntry {
  const harmony: HarmonyEntry = {
    type: 'harmony',
    root: { rootStep: childText(content, 'root', 'root-step') || 'C' },
    kind: 'major',
  };

  const rootAlter = childFloat(content, 'root', 'root-alter');
  if (rootAlter !== undefined) harmony.root.rootAlter = rootAlter;

  const [kind] = elements(content, 'kind');
  if (kind) {
    const [kindNode, kindContent] = kind;
    harmony.kind = textOf(kindContent) ?? harmony.kind;
    const text = attribute(kindNode, 'text');
    if (text !== undefined) harmony.kindText = text;
  }

  const bassStep = childText(content, 'bass', 'bass-step');
  if (bassStep) {
    harmony.bass = { bassStep };
    const bassAlter = childFloat(content, 'bass', 'bass-alter');
    if (bassAlter !== undefined) harmony.bass.bassAlter = bassAlter;
  }

  const degrees: HarmonyDegree[] = [];
  for (const [, degree] of elements(content, 'degree')) {
    const value = childInt(degree, 'degree-value');
    const type = childText(degree, 'degree-type');
    if (value === undefined || !isDegreeType(type)) continue;
    const alter = childFloat(degree, 'degree-alter');
    const entry: HarmonyDegree = { degreeValue: value, degreeType: type };
    if (alter) entry.degreeAlter = alter;
    degrees.push(entry);
  }
  if (degrees.length > 0) harmony.degrees = degrees;

  const offset = childInt(content, 'offset');
  if (offset) harmony.offset = offset;

  return harmony;
}
