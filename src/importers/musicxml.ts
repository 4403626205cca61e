import { XMLParser } from 'fast-xml-parser';
import type {
  Score,
  ScoreMetadata,
  Creator,
  Credit,
  PartInfo,
  Part,
  Measure,
  MeasureAttributes,
  NoteEntry,
  DirectionEntry,
  DirectionType,
  SoundEntry,
  Pitch,
  Notation,
  ArticulationType,
  TimeSignature,
  KeySignature,
  Clef,
  DynamicsValue,
} from '../types';

// Parser with preserveOrder to maintain element order
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  preserveOrder: true,
});

interface OrderedElement {
  [key: string]: unknown;
  ':@'?: Record<string, unknown>;
}

const DYNAMICS_VALUES: readonly DynamicsValue[] = [
  'pppppp', 'ppppp', 'pppp', 'ppp', 'pp', 'p',
  'mp', 'mf',
  'f', 'ff', 'fff', 'ffff', 'fffff', 'ffffff',
  'sf', 'sfz', 'sffz', 'sfp', 'sfpp', 'fp', 'rf', 'rfz', 'fz', 'n', 'pf',
];

const ARTICULATION_TYPES: readonly ArticulationType[] = [
  'accent', 'strong-accent', 'staccato', 'staccatissimo',
  'tenuto', 'detached-legato', 'marcato', 'spiccato',
  'scoop', 'plop', 'doit', 'falloff', 'breath-mark',
  'caesura', 'stress', 'unstress', 'soft-accent',
];

export function parse(xmlString: string): Score {
  const parsed: unknown = xmlParser.parse(xmlString);
  const root = Array.isArray(parsed) ? parsed.filter(isOrderedElement) : [];

  // Find score-partwise in the ordered result
  const scorePartwise = findElement(root, 'score-partwise');
  if (!scorePartwise) {
    throw new Error('Unsupported MusicXML format: only score-partwise is supported');
  }

  return parseScorePartwise(scorePartwise);
}

function isOrderedElement(value: unknown): value is OrderedElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childrenOf(value: unknown): OrderedElement[] {
  return Array.isArray(value) ? value.filter(isOrderedElement) : [];
}

function findElement(elements: OrderedElement[], tagName: string): OrderedElement[] | undefined {
  for (const el of elements) {
    if (el[tagName] !== undefined) {
      return childrenOf(el[tagName]);
    }
  }
  return undefined;
}

function hasElement(elements: OrderedElement[], tagName: string): boolean {
  return elements.some((el) => el[tagName] !== undefined);
}

function textOf(content: OrderedElement[]): string | undefined {
  for (const item of content) {
    if (item['#text'] !== undefined) {
      return String(item['#text']);
    }
  }
  return undefined;
}

function getElementText(elements: OrderedElement[], tagName: string): string | undefined {
  const content = findElement(elements, tagName);
  if (!content) return undefined;
  // Element exists but has no text content - return empty string
  return textOf(content) ?? '';
}

function getAttributes(element: OrderedElement): Record<string, string> {
  const attrs: Record<string, string> = {};
  const rawAttrs = element[':@'];
  if (rawAttrs) {
    for (const [key, value] of Object.entries(rawAttrs)) {
      if (key.startsWith('@_')) {
        attrs[key.slice(2)] = String(value);
      }
    }
  }
  return attrs;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseScorePartwise(elements: OrderedElement[]): Score {
  const metadata = parseMetadata(elements);
  const partListContent = findElement(elements, 'part-list');
  const partList = partListContent ? parsePartList(partListContent) : [];
  const parts = parseParts(elements);

  return {
    metadata,
    partList,
    parts,
  };
}

function parseMetadata(elements: OrderedElement[]): ScoreMetadata {
  const metadata: ScoreMetadata = {};

  // Work info
  const work = findElement(elements, 'work');
  if (work) {
    metadata.workTitle = getElementText(work, 'work-title');
  }

  // Movement info
  metadata.movementTitle = getElementText(elements, 'movement-title');

  // Identification
  const identification = findElement(elements, 'identification');
  if (identification) {
    const creators: Creator[] = [];
    for (const el of identification) {
      if (el['creator'] !== undefined) {
        const attrs = getAttributes(el);
        const creator: Creator = { value: textOf(childrenOf(el['creator'])) ?? '' };
        if (attrs['type']) creator.type = attrs['type'];
        creators.push(creator);
      }
    }
    if (creators.length > 0) metadata.creators = creators;
  }

  // Credits
  const credits: Credit[] = [];
  for (const el of elements) {
    if (el['credit'] !== undefined) {
      const content = childrenOf(el['credit']);
      const credit: Credit = { words: [] };
      const creditType = getElementText(content, 'credit-type');
      if (creditType) credit.creditType = creditType;
      for (const item of content) {
        if (item['credit-words'] !== undefined) {
          const words = textOf(childrenOf(item['credit-words']));
          if (words) credit.words.push(words);
        }
      }
      credits.push(credit);
    }
  }
  if (credits.length > 0) metadata.credits = credits;

  return metadata;
}

function parsePartList(elements: OrderedElement[]): PartInfo[] {
  const partList: PartInfo[] = [];

  for (const el of elements) {
    if (el['score-part'] !== undefined) {
      const attrs = getAttributes(el);
      const content = childrenOf(el['score-part']);
      const info: PartInfo = { id: attrs['id'] || '' };

      const name = getElementText(content, 'part-name');
      if (name) info.name = name;

      const instrumentNames: string[] = [];
      for (const item of content) {
        if (item['score-instrument'] !== undefined) {
          const instName = getElementText(childrenOf(item['score-instrument']), 'instrument-name');
          if (instName) instrumentNames.push(instName);
        }
      }
      if (instrumentNames.length > 0) info.instrumentNames = instrumentNames;

      partList.push(info);
    }
  }

  return partList;
}

function parseParts(elements: OrderedElement[]): Part[] {
  const parts: Part[] = [];

  for (const el of elements) {
    if (el['part'] !== undefined) {
      const attrs = getAttributes(el);
      const content = childrenOf(el['part']);

      const part: Part = {
        id: attrs['id'] || '',
        measures: [],
      };

      for (const measureEl of content) {
        if (measureEl['measure'] !== undefined) {
          part.measures.push(parseMeasure(childrenOf(measureEl['measure']), getAttributes(measureEl)));
        }
      }

      parts.push(part);
    }
  }

  return parts;
}

function parseMeasure(elements: OrderedElement[], attrs: Record<string, string>): Measure {
  const measure: Measure = {
    // Measure numbers are tokens; labels such as "12a" are legal
    number: attrs['number'] ?? '',
    entries: [],
  };

  let isFirstAttributes = true;

  // Process elements in order - this is the key to maintaining order!
  for (const el of elements) {
    if (el['attributes'] !== undefined) {
      const parsedAttrs = parseAttributes(childrenOf(el['attributes']));
      if (isFirstAttributes) {
        measure.attributes = parsedAttrs;
        isFirstAttributes = false;
      } else {
        // Mid-measure attributes go into entries
        measure.entries.push({ type: 'attributes', attributes: parsedAttrs });
      }
    } else if (el['note'] !== undefined) {
      measure.entries.push(parseNote(childrenOf(el['note'])));
    } else if (el['direction'] !== undefined) {
      measure.entries.push(parseDirection(childrenOf(el['direction'])));
    } else if (el['sound'] !== undefined) {
      measure.entries.push(parseSound(getAttributes(el)));
    }
  }

  return measure;
}

function parseAttributes(elements: OrderedElement[]): MeasureAttributes {
  const attrs: MeasureAttributes = {};

  const staves = parseOptionalInt(getElementText(elements, 'staves'));
  if (staves !== undefined) attrs.staves = staves;

  // Time signature
  for (const el of elements) {
    if (el['time'] !== undefined) {
      attrs.time = parseTimeSignature(childrenOf(el['time']), getAttributes(el));
      break;
    }
  }

  // Key signature: first one wins for multi-staff keys
  const key = findElement(elements, 'key');
  if (key) attrs.key = parseKeySignature(key);

  // Clef(s)
  const clefs: Clef[] = [];
  for (const el of elements) {
    if (el['clef'] !== undefined) {
      clefs.push(parseClef(childrenOf(el['clef']), getAttributes(el)));
    }
  }
  if (clefs.length > 0) attrs.clef = clefs;

  return attrs;
}

function parseTimeSignature(elements: OrderedElement[], attrs: Record<string, string>): TimeSignature {
  const time: TimeSignature = {};

  const beats = getElementText(elements, 'beats');
  if (beats) time.beats = beats;

  const beatType = getElementText(elements, 'beat-type');
  if (beatType) time.beatType = beatType;

  if (attrs['symbol']) time.symbol = attrs['symbol'];

  return time;
}

function parseKeySignature(elements: OrderedElement[]): KeySignature {
  const key: KeySignature = {};

  const fifths = parseOptionalInt(getElementText(elements, 'fifths'));
  if (fifths !== undefined) key.fifths = fifths;

  const mode = getElementText(elements, 'mode');
  if (mode) key.mode = mode;

  return key;
}

function parseClef(elements: OrderedElement[], attrs: Record<string, string>): Clef {
  const clef: Clef = {};

  const sign = getElementText(elements, 'sign');
  if (sign) clef.sign = sign;

  const line = getElementText(elements, 'line');
  if (line) clef.line = line;

  const staff = parseOptionalInt(attrs['number']);
  if (staff !== undefined) clef.staff = staff;

  return clef;
}

function parseNote(elements: OrderedElement[]): NoteEntry {
  const note: NoteEntry = {
    type: 'note',
    dots: 0,
  };

  if (hasElement(elements, 'rest')) note.rest = true;
  if (hasElement(elements, 'unpitched')) note.unpitched = true;

  // Pitch
  const pitch = findElement(elements, 'pitch');
  if (pitch) {
    note.pitch = parsePitch(pitch);
  }

  // Staff
  const staff = parseOptionalInt(getElementText(elements, 'staff'));
  if (staff !== undefined) note.staff = staff;

  // Note type
  const noteType = getElementText(elements, 'type');
  if (noteType) note.noteType = noteType;

  // Dots
  for (const el of elements) {
    if (el['dot'] !== undefined) {
      note.dots++;
    }
  }

  // Accidental (raw text; mapping happens in the notation pass)
  const accidental = getElementText(elements, 'accidental');
  if (accidental) note.accidental = accidental;

  // Notations - collect ALL notations elements, not just the first
  const allNotations: Notation[] = [];
  for (const el of elements) {
    if (el['notations'] !== undefined) {
      allNotations.push(...parseNotations(childrenOf(el['notations'])));
    }
  }
  if (allNotations.length > 0) {
    note.notations = allNotations;
  }

  return note;
}

function parsePitch(elements: OrderedElement[]): Pitch {
  const pitch: Pitch = {};

  const step = getElementText(elements, 'step');
  if (step) pitch.step = step;

  const octave = getElementText(elements, 'octave');
  if (octave) pitch.octave = octave;

  return pitch;
}

function parseNotations(elements: OrderedElement[]): Notation[] {
  const notations: Notation[] = [];

  for (const el of elements) {
    if (el['slur'] !== undefined) {
      const attrs = getAttributes(el);
      const slurType = attrs['type'];
      if (slurType === 'start' || slurType === 'stop' || slurType === 'continue') {
        notations.push({
          type: 'slur',
          slurType,
        });
      }
    } else if (el['articulations'] !== undefined) {
      for (const art of childrenOf(el['articulations'])) {
        for (const artType of ARTICULATION_TYPES) {
          if (art[artType] !== undefined) {
            notations.push({ type: 'articulation', articulation: artType });
          }
        }
      }
    } else if (el['dynamics'] !== undefined) {
      const values = parseDynamicsValues(childrenOf(el['dynamics']));
      if (values.length > 0) {
        notations.push({ type: 'dynamics', values });
      }
    }
  }

  return notations;
}

function parseDynamicsValues(elements: OrderedElement[]): DynamicsValue[] {
  const values: DynamicsValue[] = [];
  for (const dyn of elements) {
    for (const dv of DYNAMICS_VALUES) {
      if (dyn[dv] !== undefined) {
        values.push(dv);
      }
    }
  }
  return values;
}

function parseDirection(elements: OrderedElement[]): DirectionEntry {
  const direction: DirectionEntry = {
    type: 'direction',
    directionTypes: [],
  };

  const staff = parseOptionalInt(getElementText(elements, 'staff'));
  if (staff !== undefined) direction.staff = staff;

  // Direction types
  for (const el of elements) {
    if (el['direction-type'] !== undefined) {
      direction.directionTypes.push(...parseDirectionType(childrenOf(el['direction-type'])));
    }
  }

  // Sound
  for (const el of elements) {
    if (el['sound'] !== undefined) {
      const soundAttrs = getAttributes(el);
      direction.sound = {};
      if (soundAttrs['tempo']) direction.sound.tempo = soundAttrs['tempo'];
      break;
    }
  }

  return direction;
}

function parseDirectionType(elements: OrderedElement[]): DirectionType[] {
  const types: DirectionType[] = [];

  for (const el of elements) {
    // Dynamics
    if (el['dynamics'] !== undefined) {
      const values = parseDynamicsValues(childrenOf(el['dynamics']));
      if (values.length > 0) {
        types.push({ kind: 'dynamics', values });
      }
    }

    // Metronome
    if (el['metronome'] !== undefined) {
      const metContent = childrenOf(el['metronome']);
      const metronome: Extract<DirectionType, { kind: 'metronome' }> = { kind: 'metronome' };
      const beatUnit = getElementText(metContent, 'beat-unit');
      if (beatUnit) metronome.beatUnit = beatUnit;
      const perMinute = getElementText(metContent, 'per-minute');
      if (perMinute) metronome.perMinute = perMinute;
      types.push(metronome);
    }

    // Words
    if (el['words'] !== undefined) {
      const text = textOf(childrenOf(el['words']));
      if (text) {
        types.push({ kind: 'words', text });
      }
    }
  }

  return types;
}

function parseSound(attrs: Record<string, string>): SoundEntry {
  const sound: SoundEntry = { type: 'sound' };
  if (attrs['tempo']) sound.tempo = attrs['tempo'];
  return sound;
}
