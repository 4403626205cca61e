// ============================================================
// Namespaces
// ============================================================
export const NAMESPACES = {
  so: 'https://github.com/valdiviasharon/Sonata-Ontology/sonata_ontology#',
  mo: 'http://purl.org/ontology/mo/',
  mto: 'http://purl.org/ontology/mto/',
  mso: 'http://linkeddata.uni-muenster.de/ontology/musicscore#',
  ho: 'https://github.com/andreamust/HaMSE_Ontology/schema#',
  dct: 'http://purl.org/dc/terms/',
  rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
} as const;

export type NamespacePrefix = keyof typeof NAMESPACES;

// ============================================================
// Node types
// ============================================================
export type PitchStep = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';
export type KeyMode = 'major' | 'minor';

export type DurationClass =
  | 'so:WholeNote' | 'so:HalfNote' | 'so:QuarterNote' | 'so:EighthNote'
  | 'so:SixteenthNote' | 'so:ThirtySecondNote' | 'so:SixtyFourthNote'
  | 'so:DottedHalf' | 'so:DottedQuarter' | 'so:DottedEighth';

export type AccidentalClass =
  | 'so:Flat' | 'so:Natural' | 'so:Sharp'
  | 'so:DoubleFlat' | 'so:DoubleSharp'
  | 'so:FlatFlat' | 'so:SharpSharp';

export type ArticulationClass = 'so:Staccato' | 'so:Accent' | 'so:Tenuto' | 'so:Legato';

export type TimeSignatureClass = `so:TS_${number}_${number}`;
export type KeySignatureClass = 'so:KS_0' | `so:KS_${number}sharps` | `so:KS_${number}flats`;
export type KeyClass = `so:Key_${string}_${KeyMode}`;

/**
 * Closed set of classes a graph node can carry. Types accumulate across
 * passes and are never removed.
 */
export type NodeType =
  // Work level
  | 'mo:MusicalWork' | 'so:Sonata' | 'so:Metadata'
  | 'so:Piano' | 'so:Instrument'
  | 'mto:Key' | 'so:HarmonicElement' | KeyClass
  | 'mto:KeySignature' | 'mto:Signature' | KeySignatureClass
  // Structure
  | 'mso:Movement' | 'so:SonataMovement' | 'so:StructuralElement'
  | 'mso:Staff' | 'so:PianoStaff' | 'so:UpperPianoStaff' | 'so:LowerPianoStaff'
  | 'mso:Measure'
  // Notation
  | 'so:MusicNotationElement'
  | 'mso:TimeSignature' | TimeSignatureClass
  | 'mso:Clef' | 'so:Tempo'
  | 'ho:SymbolicEvent' | 'mso:Note' | 'mso:Rest'
  | 'so:Duration' | DurationClass
  | 'so:Pitch' | 'so:MelodicElement' | `so:${PitchStep}`
  | 'mto:Accidental' | AccidentalClass
  // Expression
  | 'mso:Dynamic' | 'so:ExpressiveElement' | 'so:LoudnessDynamic'
  | 'mso:Articulation' | ArticulationClass
  // Complexity
  | 'so:TechnicalComplexityProfile' | 'so:LocalComplexityIndex' | 'so:GlobalComplexityProfile';

const FIXED_NODE_TYPES: ReadonlySet<string> = new Set<NodeType>([
  'mo:MusicalWork', 'so:Sonata', 'so:Metadata',
  'so:Piano', 'so:Instrument',
  'mto:Key', 'so:HarmonicElement',
  'mto:KeySignature', 'mto:Signature', 'so:KS_0',
  'mso:Movement', 'so:SonataMovement', 'so:StructuralElement',
  'mso:Staff', 'so:PianoStaff', 'so:UpperPianoStaff', 'so:LowerPianoStaff',
  'mso:Measure',
  'so:MusicNotationElement',
  'mso:TimeSignature',
  'mso:Clef', 'so:Tempo',
  'ho:SymbolicEvent', 'mso:Note', 'mso:Rest',
  'so:Duration',
  'so:WholeNote', 'so:HalfNote', 'so:QuarterNote', 'so:EighthNote',
  'so:SixteenthNote', 'so:ThirtySecondNote', 'so:SixtyFourthNote',
  'so:DottedHalf', 'so:DottedQuarter', 'so:DottedEighth',
  'so:Pitch', 'so:MelodicElement',
  'so:A', 'so:B', 'so:C', 'so:D', 'so:E', 'so:F', 'so:G',
  'mto:Accidental',
  'so:Flat', 'so:Natural', 'so:Sharp', 'so:DoubleFlat', 'so:DoubleSharp', 'so:FlatFlat', 'so:SharpSharp',
  'mso:Dynamic', 'so:ExpressiveElement', 'so:LoudnessDynamic',
  'mso:Articulation', 'so:Staccato', 'so:Accent', 'so:Tenuto', 'so:Legato',
  'so:TechnicalComplexityProfile', 'so:LocalComplexityIndex', 'so:GlobalComplexityProfile',
]);

const PATTERNED_NODE_TYPES: readonly RegExp[] = [
  /^so:TS_-?\d+(\.\d+)?_-?\d+(\.\d+)?$/,
  /^so:KS_\d+(sharps|flats)$/,
  /^so:Key_.+_(major|minor)$/,
];

export function isNodeType(value: string): value is NodeType {
  return FIXED_NODE_TYPES.has(value) || PATTERNED_NODE_TYPES.some((re) => re.test(value));
}

export function timeSignatureClass(numerator: number, denominator: number): TimeSignatureClass {
  return `so:TS_${numerator}_${denominator}`;
}

export function isPitchStep(value: string): value is PitchStep {
  return value === 'A' || value === 'B' || value === 'C' || value === 'D'
    || value === 'E' || value === 'F' || value === 'G';
}

// ============================================================
// Properties
// ============================================================
export const Prop = {
  // Work / metadata
  title: 'so:title',
  composer: 'so:composer',
  source: 'dct:source',
  label: 'rdfs:label',
  hasInstrument: 'so:hasInstrument',
  hasKey: 'so:hasKey',
  hasTonic: 'so:hasTonic',
  hasMode: 'so:hasMode',
  accidentalCount: 'so:accidentalCount',
  accidentalType: 'so:accidentalType',
  representsKey: 'so:representsKey',
  // Structure
  hasMovement: 'so:hasMovement',
  movementIndex: 'so:movementIndex',
  movementHasStaff: 'so:movementHasStaff',
  sonataMovementHasPianoStaff: 'so:sonataMovementHasPianoStaff',
  movementHasMeasure: 'so:movementHasMeasure',
  staffIndex: 'so:staffIndex',
  staffHasMeasure: 'so:staffHasMeasure',
  staffHasClef: 'so:staffHasClef',
  number: 'so:number',
  isMeasureOfStaff: 'so:isMeasureOfStaff',
  // Notation
  hasTimeSignature: 'so:hasTimeSignature',
  timeSignatureOf: 'so:timeSignatureOf',
  numerator: 'so:numerator',
  denominator: 'so:denominator',
  symbol: 'so:symbol',
  hasClef: 'so:hasClef',
  sign: 'so:sign',
  line: 'so:line',
  hasTempo: 'so:hasTempo',
  isTempoOf: 'so:isTempoOf',
  bpm: 'so:bpm',
  tempoText: 'so:tempoText',
  beatUnit: 'so:beatUnit',
  hasSymbolicEvent: 'so:hasSymbolicEvent',
  isInMeasure: 'so:isInMeasure',
  hasDuration: 'so:hasDuration',
  noteType: 'so:noteType',
  dots: 'so:dots',
  octave: 'so:octave',
  hasPitch: 'so:hasPitch',
  hasAccidental: 'so:hasAccidental',
  semitoneShift: 'so:semitoneShift',
  // Expression
  hasDynamic: 'so:hasDynamic',
  isDynamicOf: 'so:isDynamicOf',
  dynamicValue: 'so:dynamicValue',
  dynamicLevel: 'so:dynamicLevel',
  hasArticulation: 'so:hasArticulation',
  isArticulationOf: 'so:isArticulationOf',
  articulationText: 'so:articulationText',
  // Complexity
  hasLocalComplexityIndex: 'so:hasLocalComplexityIndex',
  hasGlobalComplexityProfile: 'so:hasGlobalComplexityProfile',
  noteCount: 'so:noteCount',
  measureAccidentalCount: 'so:measureAccidentalCount',
  subdivisionIndex: 'so:subdivisionIndex',
  minNoteValue: 'so:minNoteValue',
  dynamicCount: 'so:dynamicCount',
  articulationCount: 'so:articulationCount',
  lciValue: 'so:LCIvalue',
  globalComplexityIndex: 'so:globalComplexityIndex',
} as const;

export type PropertyName = (typeof Prop)[keyof typeof Prop];

/** Metric keys written by earlier versions of the LCI schema; purged on every rewrite. */
export const LEGACY_LCI_KEYS: readonly string[] = ['so:noteDensity'];
