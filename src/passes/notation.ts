import type { Score, Measure, NoteEntry, DirectionEntry } from '../types';
import { addRef, setRef } from '../graph/store';
import type { GraphNode, NodeStore } from '../graph/store';
import { Prop, isPitchStep, timeSignatureClass } from '../graph/vocabulary';
import type { AccidentalClass, DurationClass, NodeType } from '../graph/vocabulary';
import {
  EventCounter,
  accidentalId,
  clefId,
  durationId,
  eventId,
  pitchId,
  staffId,
  tempoId,
  timeSignatureId,
} from '../id';
import { integerOrText, measureNumberValue } from '../query';
import { classifyNote, getDirectionOfKind, getEntryStaff, getSoundTempo } from '../entry-accessors';
import { createPassReport, recordSkip } from '../diagnostics';
import type { PassReport } from '../diagnostics';
import { prepareTraversal } from './context';
import type { MeasureSlot, PassOptions } from './context';

// ============================================================
// Classification tables
// ============================================================

const UNDOTTED_DURATION_CLASSES = new Map<string, DurationClass>([
  ['whole', 'so:WholeNote'],
  ['half', 'so:HalfNote'],
  ['quarter', 'so:QuarterNote'],
  ['eighth', 'so:EighthNote'],
  ['16th', 'so:SixteenthNote'],
  ['32nd', 'so:ThirtySecondNote'],
  ['64th', 'so:SixtyFourthNote'],
]);

const DOTTED_DURATION_CLASSES = new Map<string, DurationClass>([
  ['half', 'so:DottedHalf'],
  ['quarter', 'so:DottedQuarter'],
  ['eighth', 'so:DottedEighth'],
]);

export interface AccidentalInfo {
  type: AccidentalClass;
  semitoneShift: number;
}

const ACCIDENTALS = new Map<string, AccidentalInfo>([
  ['flat', { type: 'so:Flat', semitoneShift: -1 }],
  ['natural', { type: 'so:Natural', semitoneShift: 0 }],
  ['sharp', { type: 'so:Sharp', semitoneShift: 1 }],
  ['double-flat', { type: 'so:DoubleFlat', semitoneShift: -2 }],
  ['double-sharp', { type: 'so:DoubleSharp', semitoneShift: 2 }],
  ['flat-flat', { type: 'so:FlatFlat', semitoneShift: -2 }],
  ['sharp-sharp', { type: 'so:SharpSharp', semitoneShift: 2 }],
]);

/**
 * Duration class of a note type with a dot count. Only undotted values and
 * single-dotted half, quarter and eighth notes have a class.
 */
export function durationClass(noteType: string | undefined, dots: number): DurationClass | undefined {
  if (noteType === undefined) return undefined;
  if (dots === 0) return UNDOTTED_DURATION_CLASSES.get(noteType);
  if (dots === 1) return DOTTED_DURATION_CLASSES.get(noteType);
  return undefined;
}

export function accidentalInfo(text: string): AccidentalInfo | undefined {
  return ACCIDENTALS.get(text);
}

// ============================================================
// Pass
// ============================================================

const NOTATION_ELEMENT: NodeType = 'so:MusicNotationElement';

/**
 * Get or create the symbolic event for a classified note. Shared by every
 * pass that addresses events so the base types always match.
 */
export function eventNode(store: NodeStore, id: string, kind: 'note' | 'rest'): GraphNode {
  return store.getOrCreate(id, ['ho:SymbolicEvent', NOTATION_ELEMENT, kind === 'rest' ? 'mso:Rest' : 'mso:Note']);
}

/**
 * Attach time signatures, clefs, tempi, symbolic events, durations,
 * pitches and accidentals to the measures of every movement.
 */
export function buildNotation(store: NodeStore, score: Score, options: PassOptions): PassReport {
  const traversal = prepareTraversal(score, options);
  const report = createPassReport('notation');
  const counter = new EventCounter();

  for (const movement of traversal.movements) {
    // staff number → clef id in effect, per movement
    const activeClefs = new Map<number, string>();

    for (const slot of movement.measures) {
      const measure = store.getOrCreate(slot.id, ['mso:Measure']);
      if (!measure.properties.has(Prop.number)) {
        measure.properties.set(Prop.number, measureNumberValue(slot.measure.number, slot.position + 1));
      }

      addTimeSignature(store, measure, slot.measure);
      addClefs(store, measure, slot.measure, movement.id, activeClefs);
      addTempi(store, measure, slot.measure);

      for (const entry of slot.measure.entries) {
        if (entry.type !== 'note') continue;
        addEvent(store, measure, slot, entry, counter, activeClefs, report);
      }
    }
  }

  return report;
}

function addTimeSignature(store: NodeStore, measure: GraphNode, source: Measure): void {
  const time = source.attributes?.time;
  if (time?.beats === undefined || time.beatType === undefined) return;

  const numerator = integerOrText(time.beats);
  const denominator = integerOrText(time.beatType);

  const types: NodeType[] = ['mso:TimeSignature', NOTATION_ELEMENT, 'mto:Signature'];
  if (typeof numerator === 'number' && typeof denominator === 'number') {
    types.push(timeSignatureClass(numerator, denominator));
  }

  const signature = store.getOrCreate(timeSignatureId(measure.id), types);
  signature.properties.set(Prop.numerator, numerator);
  signature.properties.set(Prop.denominator, denominator);
  if (time.symbol !== undefined) signature.properties.set(Prop.symbol, time.symbol);

  setRef(measure, Prop.hasTimeSignature, signature.id);
  setRef(signature, Prop.timeSignatureOf, measure.id);
}

function addClefs(
  store: NodeStore,
  measure: GraphNode,
  source: Measure,
  movement: string,
  activeClefs: Map<number, string>
): void {
  for (const clef of source.attributes?.clef ?? []) {
    const staffNumber = clef.staff ?? 1;
    const clefNode = store.getOrCreate(clefId(movement, staffNumber), ['mso:Clef', NOTATION_ELEMENT]);
    if (clef.sign !== undefined) clefNode.properties.set(Prop.sign, clef.sign);
    if (clef.line !== undefined) clefNode.properties.set(Prop.line, integerOrText(clef.line));

    activeClefs.set(staffNumber, clefNode.id);

    const staff = store.get(staffId(movement, staffNumber));
    if (staff) addRef(staff, Prop.staffHasClef, clefNode.id);
    addRef(measure, Prop.hasClef, clefNode.id);
  }
}

/**
 * Measure-level `<sound tempo>` first, then every direction in order: its
 * own `<sound tempo>` wins over a metronome mark. Every occurrence is a new
 * Tempo node.
 */
function addTempi(store: NodeStore, measure: GraphNode, source: Measure): void {
  let k = 0;
  const addTempo = (bpm: string): GraphNode => {
    k += 1;
    const tempo = store.getOrCreate(tempoId(measure.id, k), ['so:Tempo', NOTATION_ELEMENT]);
    tempo.properties.set(Prop.bpm, integerOrText(bpm));
    addRef(measure, Prop.hasTempo, tempo.id);
    setRef(tempo, Prop.isTempoOf, measure.id);
    return tempo;
  };

  for (const entry of source.entries) {
    if (entry.type === 'sound' && entry.tempo) addTempo(entry.tempo);
  }

  const directions = source.entries.filter((entry): entry is DirectionEntry => entry.type === 'direction');
  for (const direction of directions) {
    const tempoText = getDirectionOfKind(direction, 'words')?.text;

    const soundTempo = getSoundTempo(direction);
    if (soundTempo) {
      const tempo = addTempo(soundTempo);
      if (tempoText !== undefined) tempo.properties.set(Prop.tempoText, tempoText);
      continue;
    }

    const metronome = getDirectionOfKind(direction, 'metronome');
    if (metronome?.perMinute) {
      const tempo = addTempo(metronome.perMinute);
      if (tempoText !== undefined) tempo.properties.set(Prop.tempoText, tempoText);
      if (metronome.beatUnit !== undefined) tempo.properties.set(Prop.beatUnit, metronome.beatUnit);
    }
  }
}

function addEvent(
  store: NodeStore,
  measure: GraphNode,
  slot: MeasureSlot,
  note: NoteEntry,
  counter: EventCounter,
  activeClefs: Map<number, string>,
  report: PassReport
): void {
  const kind = classifyNote(note);
  if (kind === undefined) {
    recordSkip(
      report,
      'unclassified-event',
      `Note in measure "${slot.measure.number}" is neither a rest nor pitched nor unpitched`,
      measure.id
    );
    return;
  }

  const id = eventId(measure.id, counter.next());
  const event = eventNode(store, id, kind);
  setRef(event, Prop.isInMeasure, measure.id);
  addRef(measure, Prop.hasSymbolicEvent, id);

  // Duration
  const durationTypes: NodeType[] = ['so:Duration', NOTATION_ELEMENT];
  const durationType = durationClass(note.noteType, note.dots);
  if (durationType) durationTypes.push(durationType);
  const duration = store.getOrCreate(durationId(id), durationTypes);
  if (note.noteType !== undefined) duration.properties.set(Prop.noteType, note.noteType);
  duration.properties.set(Prop.dots, note.dots);
  setRef(event, Prop.hasDuration, duration.id);

  const clef = activeClefs.get(getEntryStaff(note));
  if (clef !== undefined) setRef(event, Prop.hasClef, clef);

  if (kind === 'note' && note.pitch) {
    addPitch(store, event, note, report);
  }
}

function addPitch(store: NodeStore, event: GraphNode, note: NoteEntry, report: PassReport): void {
  const step = note.pitch?.step?.toUpperCase();
  const octave = note.pitch?.octave;
  if (octave !== undefined) event.properties.set(Prop.octave, integerOrText(octave));

  if (step === undefined || !isPitchStep(step) || octave === undefined) {
    recordSkip(report, 'incomplete-pitch', `Pitch of ${event.id} lacks a valid step or an octave`, event.id);
    return;
  }

  const pitch = store.getOrCreate(pitchId(event.id), ['so:Pitch', 'so:MelodicElement', `so:${step}`]);
  setRef(event, Prop.hasPitch, pitch.id);

  if (note.accidental === undefined) return;
  const info = accidentalInfo(note.accidental);
  const accidental = store.getOrCreate(
    accidentalId(event.id),
    info ? ['mto:Accidental', 'so:MelodicElement', info.type] : ['mto:Accidental', 'so:MelodicElement']
  );
  if (info) accidental.properties.set(Prop.semitoneShift, info.semitoneShift);
  setRef(pitch, Prop.hasAccidental, accidental.id);
}
