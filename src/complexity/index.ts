import { deleteProperty, setRef } from '../graph/store';
import type { GraphNode, NodeStore } from '../graph/store';
import { LEGACY_LCI_KEYS, Prop } from '../graph/vocabulary';
import { gcpId, lciId } from '../id';
import { follow, getInteger, getRefId, getRefIds, getString, hasType } from '../query';

// ============================================================
// Types
// ============================================================

export type MetricName =
  | 'noteCount'
  | 'measureAccidentalCount'
  | 'subdivisionIndex'
  | 'minNoteValue'
  | 'dynamicCount'
  | 'articulationCount';

export type MeasureMetrics = Record<MetricName, number>;
export type ComplexityWeights = Record<MetricName, number>;

export const METRIC_NAMES: readonly MetricName[] = [
  'noteCount',
  'measureAccidentalCount',
  'subdivisionIndex',
  'minNoteValue',
  'dynamicCount',
  'articulationCount',
];

const METRIC_PROPERTIES: Record<MetricName, string> = {
  noteCount: Prop.noteCount,
  measureAccidentalCount: Prop.measureAccidentalCount,
  subdivisionIndex: Prop.subdivisionIndex,
  minNoteValue: Prop.minNoteValue,
  dynamicCount: Prop.dynamicCount,
  articulationCount: Prop.articulationCount,
};

export const DEFAULT_WEIGHTS: Readonly<ComplexityWeights> = {
  noteCount: 3.06,
  measureAccidentalCount: 4.31,
  subdivisionIndex: 3.75,
  minNoteValue: 3.68,
  dynamicCount: 3.68,
  articulationCount: 4.43,
};

export interface ComplexityOptions {
  /** Raw weights; missing entries keep their default */
  weights?: Partial<ComplexityWeights>;
}

const DEFAULT_OPTIONS: Required<ComplexityOptions> = {
  weights: DEFAULT_WEIGHTS,
};

export interface MeasureComplexity {
  measureId: string;
  metrics: MeasureMetrics;
  /** Unrounded weighted sum of the normalized metrics */
  lci: number;
  /** Value written as `so:LCIvalue` */
  lciValue: number;
}

export interface MovementComplexity {
  movementId: string;
  measureCount: number;
  globalComplexityIndex: number;
}

export interface ComplexityReport {
  /** Effective weights, summing to 1 */
  weights: ComplexityWeights;
  measures: MeasureComplexity[];
  movements: MovementComplexity[];
}

// ============================================================
// Numeric helpers
// ============================================================

/** Fraction of a whole note, as a denominator. Values longer than a whole note do not count. */
const NOTE_BASE_DENOMINATORS = new Map<string, number>([
  ['maxima', 0],
  ['long', 0],
  ['breve', 0],
  ['whole', 1],
  ['half', 2],
  ['quarter', 4],
  ['eighth', 8],
  ['16th', 16],
  ['32nd', 32],
  ['64th', 64],
  ['128th', 128],
  ['256th', 256],
]);

const DEFAULT_BEAT_DENOMINATOR = 4;

export function baseDenominator(noteType: string): number {
  return NOTE_BASE_DENOMINATORS.get(noteType) ?? 0;
}

export function roundTo4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

/** Min–max normalization into [0, 1]; 0 when the range is empty. */
export function minMaxNormalize(value: number, min: number, max: number): number {
  if (max <= min) return 0;
  return (value - min) / (max - min);
}

/**
 * Clamp negative weights to 0 and scale them to sum to 1. An all-zero set
 * falls back to equal weights.
 */
export function normalizeWeights(weights: Partial<ComplexityWeights> = {}): ComplexityWeights {
  const raw: ComplexityWeights = { ...DEFAULT_WEIGHTS, ...weights };
  const sum = METRIC_NAMES.reduce((acc, name) => acc + Math.max(raw[name], 0), 0);

  const result: ComplexityWeights = { ...raw };
  for (const name of METRIC_NAMES) {
    result[name] = sum > 0 ? Math.max(raw[name], 0) / sum : 1 / METRIC_NAMES.length;
  }
  return result;
}

/**
 * Read a weights override from parsed JSON. Unknown keys are rejected so a
 * misspelt metric does not silently keep its default.
 */
export function parseWeights(value: unknown): Partial<ComplexityWeights> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error('Complexity weights must be a JSON object');
  }

  const weights: Partial<ComplexityWeights> = {};
  for (const [key, weight] of Object.entries(value)) {
    const name = METRIC_NAMES.find((metric) => metric === key);
    if (name === undefined) {
      throw new Error(`Unknown complexity metric "${key}"`);
    }
    if (typeof weight !== 'number' || !Number.isFinite(weight)) {
      throw new Error(`Weight for "${key}" must be a finite number`);
    }
    weights[name] = weight;
  }
  return weights;
}

// ============================================================
// Metrics
// ============================================================

interface MeasureIndex {
  measures: GraphNode[];
  /** measure id → note events */
  notes: Map<string, GraphNode[]>;
  /** event id → measure id */
  eventMeasure: Map<string, string>;
}

function indexMeasures(store: NodeStore): MeasureIndex {
  const measures = store.nodesOfType('mso:Measure');
  const notes = new Map<string, GraphNode[]>();
  const eventMeasure = new Map<string, string>();

  for (const node of store.nodesOfType('ho:SymbolicEvent')) {
    const measureId = getRefId(node, Prop.isInMeasure);
    if (measureId === undefined) continue;
    eventMeasure.set(node.id, measureId);
    if (hasType(node, 'mso:Note')) {
      notes.set(measureId, [...(notes.get(measureId) ?? []), node]);
    }
  }

  return { measures, notes, eventMeasure };
}

function beatDenominator(store: NodeStore, measure: GraphNode): number {
  const signature = follow(store, measure, Prop.hasTimeSignature);
  return (signature && getInteger(signature, Prop.denominator)) ?? DEFAULT_BEAT_DENOMINATOR;
}

/** Count the nodes of one class per measure, following `backRef` to their event. */
function countPerMeasure(
  store: NodeStore,
  index: MeasureIndex,
  type: 'so:LoudnessDynamic' | 'so:Staccato',
  backRef: string
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const node of store.nodesOfType(type)) {
    const eventId = getRefId(node, backRef);
    const measureId = eventId === undefined ? undefined : index.eventMeasure.get(eventId);
    if (measureId !== undefined) counts.set(measureId, (counts.get(measureId) ?? 0) + 1);
  }
  return counts;
}

function measureMetrics(
  store: NodeStore,
  measure: GraphNode,
  notes: readonly GraphNode[],
  dynamicCount: number,
  articulationCount: number
): MeasureMetrics {
  const beat = beatDenominator(store, measure);
  let accidentals = 0;
  let minNoteValue = 0;
  let subdivisionIndex = 0;

  for (const note of notes) {
    const pitch = follow(store, note, Prop.hasPitch);
    if (pitch?.properties.has(Prop.hasAccidental)) accidentals += 1;

    const duration = follow(store, note, Prop.hasDuration);
    const noteType = duration && getString(duration, Prop.noteType);
    if (noteType === undefined) continue;
    const base = baseDenominator(noteType);
    if (base <= 0) continue;

    minNoteValue = Math.max(minNoteValue, base);
    subdivisionIndex = Math.max(subdivisionIndex, beat > 0 ? Math.ceil(base / beat) : base);
  }

  return {
    noteCount: notes.length,
    measureAccidentalCount: accidentals,
    subdivisionIndex,
    minNoteValue,
    dynamicCount,
    articulationCount,
  };
}

// ============================================================
// Engine
// ============================================================

/**
 * Compute the Local Complexity Index of every measure in the store and the
 * Global Complexity Profile of every movement.
 *
 * LCI nodes are rewritten on each run: all six metrics and the value are
 * replaced and keys from earlier metric schemas are removed.
 */
export function computeComplexity(store: NodeStore, options: ComplexityOptions = {}): ComplexityReport {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const weights = normalizeWeights(opts.weights);

  const index = indexMeasures(store);
  const dynamics = countPerMeasure(store, index, 'so:LoudnessDynamic', Prop.isDynamicOf);
  const staccatos = countPerMeasure(store, index, 'so:Staccato', Prop.isArticulationOf);

  const rows = index.measures.map((measure) => ({
    measure,
    metrics: measureMetrics(
      store,
      measure,
      index.notes.get(measure.id) ?? [],
      dynamics.get(measure.id) ?? 0,
      staccatos.get(measure.id) ?? 0
    ),
  }));

  const ranges = new Map<MetricName, { min: number; max: number }>();
  for (const name of METRIC_NAMES) {
    const values = rows.map((row) => row.metrics[name]);
    ranges.set(name, {
      min: values.length > 0 ? Math.min(...values) : 0,
      max: values.length > 0 ? Math.max(...values) : 0,
    });
  }

  const measures: MeasureComplexity[] = rows.map(({ measure, metrics }) => {
    let lci = 0;
    for (const name of METRIC_NAMES) {
      const range = ranges.get(name) ?? { min: 0, max: 0 };
      lci += weights[name] * minMaxNormalize(metrics[name], range.min, range.max);
    }
    const lciValue = roundTo4(lci);

    const node = store.getOrCreate(lciId(measure.id), ['so:LocalComplexityIndex', 'so:TechnicalComplexityProfile']);
    for (const key of LEGACY_LCI_KEYS) deleteProperty(node, key);
    for (const name of METRIC_NAMES) node.properties.set(METRIC_PROPERTIES[name], metrics[name]);
    node.properties.set(Prop.lciValue, lciValue);
    setRef(measure, Prop.hasLocalComplexityIndex, node.id);

    return { measureId: measure.id, metrics, lci, lciValue };
  });

  const lciByMeasure = new Map(measures.map((m) => [m.measureId, m.lci]));
  const movements: MovementComplexity[] = [];

  for (const movement of store.nodesOfType('so:SonataMovement')) {
    const values = getRefIds(movement, Prop.movementHasMeasure)
      .map((id) => lciByMeasure.get(id))
      .filter((value): value is number => value !== undefined);
    if (values.length === 0) continue;

    const globalComplexityIndex = roundTo4(values.reduce((a, b) => a + b, 0) / values.length);
    const node = store.getOrCreate(gcpId(movement.id), ['so:GlobalComplexityProfile', 'so:TechnicalComplexityProfile']);
    node.properties.set(Prop.globalComplexityIndex, globalComplexityIndex);
    setRef(movement, Prop.hasGlobalComplexityProfile, node.id);

    movements.push({ movementId: movement.id, measureCount: values.length, globalComplexityIndex });
  }

  return { weights, measures, movements };
}
