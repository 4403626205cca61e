/**
 * Entry-level accessors for NoteEntry and DirectionEntry
 *
 * Both the notation and the expression pass walk notes through these
 * helpers, so the two passes agree on which notes are events and on which
 * staff every entry sits.
 */

import type {
  DirectionEntry,
  DirectionType,
  DynamicsValue,
  NoteEntry,
  Notation,
} from './types';

// ============================================================
// DirectionType extraction helpers
// ============================================================

/**
 * Extracts a specific DirectionType union member by its kind
 */
export type DirectionTypeOfKind<K extends DirectionType['kind']> = Extract<
  DirectionType,
  { kind: K }
>;

function isKind<K extends DirectionType['kind']>(kind: K) {
  return (d: DirectionType): d is DirectionTypeOfKind<K> => d.kind === kind;
}

/**
 * Get the first direction type of a specific kind from a DirectionEntry
 *
 * @example
 * const metronome = getDirectionOfKind(entry, 'metronome');
 * if (metronome) {
 *   console.log(metronome.perMinute); // '120'
 * }
 */
export function getDirectionOfKind<K extends DirectionType['kind']>(
  entry: DirectionEntry,
  kind: K
): DirectionTypeOfKind<K> | undefined {
  return entry.directionTypes.find(isKind(kind));
}

/**
 * Get all direction types of a specific kind from a DirectionEntry
 *
 * @example
 * const allWords = getDirectionsOfKind(entry, 'words');
 * allWords.forEach(w => console.log(w.text));
 */
export function getDirectionsOfKind<K extends DirectionType['kind']>(
  entry: DirectionEntry,
  kind: K
): DirectionTypeOfKind<K>[] {
  return entry.directionTypes.filter(isKind(kind));
}

/**
 * Every dynamics token of a direction, in document order
 */
export function getDirectionDynamics(entry: DirectionEntry): DynamicsValue[] {
  return getDirectionsOfKind(entry, 'dynamics').flatMap((d) => d.values);
}

/**
 * Get tempo from DirectionEntry.sound, as written
 */
export function getSoundTempo(entry: DirectionEntry): string | undefined {
  return entry.sound?.tempo;
}

// ============================================================
// Staff
// ============================================================

/** Staff an entry belongs to; unmarked entries sit on staff 1. */
export function getEntryStaff(entry: NoteEntry | DirectionEntry): number {
  return entry.staff ?? 1;
}

// ============================================================
// NoteEntry Accessors
// ============================================================

export type EventKind = 'note' | 'rest';

/**
 * Check if a note is a rest
 */
export function isRest(note: NoteEntry): boolean {
  return note.rest === true;
}

/**
 * Check if a note carries a pitch element
 */
export function isPitchedNote(note: NoteEntry): boolean {
  return note.pitch !== undefined;
}

/**
 * Check if a note is unpitched (percussion)
 */
export function isUnpitchedNote(note: NoteEntry): boolean {
  return note.unpitched === true;
}

/**
 * Classify a note element as a symbolic event. A note that is neither a
 * rest nor pitched nor unpitched is not an event and takes no ordinal.
 */
export function classifyNote(note: NoteEntry): EventKind | undefined {
  if (isRest(note)) return 'rest';
  if (isPitchedNote(note) || isUnpitchedNote(note)) return 'note';
  return undefined;
}

/**
 * Get all notations of a specific type from a NoteEntry
 */
export function getNotationsOfType<T extends Notation['type']>(
  note: NoteEntry,
  type: T
): Extract<Notation, { type: T }>[] {
  return (note.notations ?? []).filter(
    (n): n is Extract<Notation, { type: T }> => n.type === type
  );
}

/**
 * Every dynamics token written inside the note's notations
 */
export function getNoteDynamics(note: NoteEntry): DynamicsValue[] {
  return getNotationsOfType(note, 'dynamics').flatMap((n) => n.values);
}
