/**
 * Positional identity scheme.
 *
 * Every node id is derived from where the entity sits in the score:
 * work → movement → staff / measure → event → sub-feature. Two passes that
 * walk the same score in the same order therefore compute the same ids and
 * meet on the same nodes without sharing any other state.
 *
 * Examples for work "Sonata1":
 *   so:Sonata1_M1
 *   so:Sonata1_M1_Staff_2_Clef
 *   so:Sonata1_M2_Measure_12a
 *   so:Sonata1_M2_Measure_12a_Event_000042_Pitch
 */

const WORK_PREFIX = 'so:';
const ORDINAL_WIDTH = 6;

/**
 * Derive the work identifier from a source path: base name without the
 * last extension. Both `/` and `\` separate directories.
 */
export function workIdFromPath(path: string): string {
  const base = path.split(/[\\/]/).pop() ?? path;
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

export function workNodeId(workId: string): string {
  return `${WORK_PREFIX}${workId}`;
}

export function instrumentId(workId: string): string {
  return `${workNodeId(workId)}_Instrument`;
}

export function globalKeyId(workId: string): string {
  return `${workNodeId(workId)}_GlobalKey`;
}

export function globalKeySignatureId(workId: string): string {
  return `${workNodeId(workId)}_GlobalKeySignature`;
}

/** `movementNumber` is 1-based */
export function movementId(workId: string, movementNumber: number): string {
  return `${workNodeId(workId)}_M${movementNumber}`;
}

/** `staffNumber` is 1-based */
export function staffId(movement: string, staffNumber: number): string {
  return `${movement}_Staff_${staffNumber}`;
}

export function clefId(movement: string, staffNumber: number): string {
  return `${staffId(movement, staffNumber)}_Clef`;
}

/**
 * Replace every code point that is not a Unicode letter or digit with `_`.
 * An empty label falls back to the measure's 1-based position in the whole
 * (unsegmented) measure list.
 */
export function sanitizeMeasureLabel(label: string | undefined, position: number): string {
  if (label === undefined || label === '') {
    return String(position);
  }
  return label.replace(/[^\p{L}\p{N}]/gu, '_');
}

export function measureId(movement: string, label: string | undefined, position: number): string {
  return `${movement}_Measure_${sanitizeMeasureLabel(label, position)}`;
}

export function formatOrdinal(ordinal: number): string {
  return String(ordinal).padStart(ORDINAL_WIDTH, '0');
}

export function eventId(measure: string, ordinal: number): string {
  return `${measure}_Event_${formatOrdinal(ordinal)}`;
}

export function durationId(event: string): string {
  return `${event}_Dur`;
}

export function pitchId(event: string): string {
  return `${event}_Pitch`;
}

export function accidentalId(event: string): string {
  return `${event}_Accidental`;
}

/** `n` is 1-based, counted per event */
export function dynamicId(event: string, n: number): string {
  return `${event}_Dyn_${n}`;
}

/** `n` is 1-based, counted per event */
export function articulationId(event: string, n: number): string {
  return `${event}_Art_${n}`;
}

export function timeSignatureId(measure: string): string {
  return `${measure}_TimeSig`;
}

/** `k` is 1-based and restarts in every measure */
export function tempoId(measure: string, k: number): string {
  return `${measure}_Tempo_${k}`;
}

export function lciId(measure: string): string {
  return `${measure}_LCI`;
}

export function gcpId(movement: string): string {
  return `${movement}_GCP`;
}

/**
 * Work-wide ordinal source for symbolic events. One increment per
 * note-or-rest across every movement; each pass that needs event ids
 * walks the score with its own fresh counter.
 */
export class EventCounter {
  private value = 0;

  next(): number {
    this.value += 1;
    return this.value;
  }

  get current(): number {
    return this.value;
  }
}
