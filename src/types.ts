// ============================================================
// Score (root)
// ============================================================
export interface Score {
  metadata: ScoreMetadata;
  partList: PartInfo[];
  parts: Part[];
}

export interface ScoreMetadata {
  workTitle?: string;
  movementTitle?: string;
  creators?: Creator[];
  credits?: Credit[];
}

export interface Creator {
  type?: string;
  value: string;
}

export interface Credit {
  creditType?: string;
  words: string[];
}

export interface PartInfo {
  id: string;
  name?: string;
  instrumentNames?: string[];
}

// ============================================================
// Part / Measure
// ============================================================
export interface Part {
  id: string;
  measures: Measure[];
}

export interface Measure {
  /** Raw `number` attribute; empty string when the attribute is missing */
  number: string;
  /** First attributes block of the measure */
  attributes?: MeasureAttributes;
  entries: MeasureEntry[];
}

export interface MeasureAttributes {
  time?: TimeSignature;
  key?: KeySignature;
  clef?: Clef[];
  staves?: number;
}

/**
 * Beats and beat type are kept as written: compound signatures such as
 * "3+2" are legal MusicXML and must survive untouched.
 */
export interface TimeSignature {
  beats?: string;
  beatType?: string;
  symbol?: string;
}

export interface KeySignature {
  fifths?: number;
  mode?: string;
}

export interface Clef {
  sign?: string;
  line?: string;
  staff?: number;
}

// ============================================================
// MeasureEntry (flat structure preserving MusicXML order)
// ============================================================
export type MeasureEntry = NoteEntry | DirectionEntry | SoundEntry | AttributesEntry;

export interface NoteEntry {
  type: 'note';
  rest?: boolean;
  pitch?: Pitch;
  unpitched?: boolean;
  staff?: number;

  noteType?: string;
  dots: number;
  accidental?: string;

  notations?: Notation[];
}

/** Step and octave are optional: incomplete pitches are reported downstream, not here. */
export interface Pitch {
  step?: string;
  octave?: string;
}

export interface DirectionEntry {
  type: 'direction';
  directionTypes: DirectionType[];
  staff?: number;
  sound?: {
    tempo?: string;
  };
}

export interface SoundEntry {
  type: 'sound';
  tempo?: string;
}

/** Mid-measure attributes; only the first block of a measure lands in `Measure.attributes`. */
export interface AttributesEntry {
  type: 'attributes';
  attributes: MeasureAttributes;
}

// ============================================================
// Notation (articulations, slurs, dynamics)
// ============================================================
export type Notation =
  | { type: 'articulation'; articulation: ArticulationType }
  | { type: 'slur'; slurType: 'start' | 'stop' | 'continue' }
  | { type: 'dynamics'; values: DynamicsValue[] };

export type ArticulationType =
  | 'accent' | 'strong-accent' | 'staccato' | 'staccatissimo'
  | 'tenuto' | 'detached-legato' | 'marcato' | 'spiccato'
  | 'scoop' | 'plop' | 'doit' | 'falloff' | 'breath-mark'
  | 'caesura' | 'stress' | 'unstress' | 'soft-accent';

// ============================================================
// Direction (dynamics, tempo, etc)
// ============================================================
export type DirectionType =
  | { kind: 'dynamics'; values: DynamicsValue[] }
  | { kind: 'metronome'; beatUnit?: string; perMinute?: string }
  | { kind: 'words'; text: string };

export type DynamicsValue =
  | 'pppppp' | 'ppppp' | 'pppp' | 'ppp' | 'pp' | 'p'
  | 'mp' | 'mf'
  | 'f' | 'ff' | 'fff' | 'ffff' | 'fffff' | 'ffffff'
  | 'sf' | 'sfz' | 'sffz' | 'sfp' | 'sfpp' | 'fp' | 'rf' | 'rfz' | 'fz' | 'n' | 'pf';
