import type { Score, NoteEntry } from '../types';
import { addRef, setRef } from '../graph/store';
import type { GraphNode, NodeStore } from '../graph/store';
import { Prop } from '../graph/vocabulary';
import type { ArticulationClass, NodeType } from '../graph/vocabulary';
import { EventCounter, articulationId, dynamicId, eventId } from '../id';
import {
  classifyNote,
  getDirectionDynamics,
  getEntryStaff,
  getNoteDynamics,
  getNotationsOfType,
} from '../entry-accessors';
import { createPassReport, recordSkip } from '../diagnostics';
import type { PassReport } from '../diagnostics';
import { prepareTraversal } from './context';
import type { PassOptions } from './context';
import { eventNode } from './notation';

/** Tokens that describe a loudness level, as opposed to accents such as "sfz" or "rf" */
export const LOUDNESS_DYNAMICS: ReadonlySet<string> = new Set([
  'ppp', 'pp', 'p', 'mp', 'mf', 'f', 'ff', 'fff',
  'sf', 'sfp', 'fp', 'pf',
]);

/** Relative loudness on a 1–8 scale; compound marks take their attack level */
export const DYNAMIC_LEVELS: ReadonlyMap<string, number> = new Map([
  ['ppp', 1], ['pp', 2], ['p', 3], ['mp', 4],
  ['mf', 5], ['f', 6], ['ff', 7], ['fff', 8],
  ['sf', 7], ['sfp', 7], ['fp', 6], ['pf', 6],
]);

const ARTICULATION_CLASSES = new Map<string, ArticulationClass>([
  ['staccato', 'so:Staccato'],
  ['accent', 'so:Accent'],
  ['tenuto', 'so:Tenuto'],
]);

const EXPRESSIVE_ELEMENT: NodeType = 'so:ExpressiveElement';

/** Per-event numbering of the Dynamic and Articulation nodes created in this pass */
class FeatureNumbering {
  private readonly counts = new Map<string, number>();

  next(key: string): number {
    const n = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, n);
    return n;
  }
}

/**
 * Attach dynamics and articulations to symbolic events.
 *
 * A dynamics direction is queued on its staff and lands on the next event of
 * that staff within the same measure; queues are dropped at every barline.
 * Event ids are recomputed with a fresh counter in the notation pass's
 * order, so this pass merges into the events built there (or creates them
 * when run on its own).
 */
export function attachExpression(store: NodeStore, score: Score, options: PassOptions): PassReport {
  const traversal = prepareTraversal(score, options);
  const report = createPassReport('expression');
  const counter = new EventCounter();
  const dynamicNumbers = new FeatureNumbering();
  const articulationNumbers = new FeatureNumbering();

  for (const movement of traversal.movements) {
    for (const slot of movement.measures) {
      const pending = new Map<number, string[]>();

      for (const entry of slot.measure.entries) {
        if (entry.type === 'direction') {
          const tokens = getDirectionDynamics(entry);
          if (tokens.length === 0) continue;
          const staff = getEntryStaff(entry);
          pending.set(staff, [...(pending.get(staff) ?? []), ...tokens]);
          continue;
        }
        if (entry.type !== 'note') continue;

        const kind = classifyNote(entry);
        if (kind === undefined) {
          recordSkip(
            report,
            'unclassified-event',
            `Note in measure "${slot.measure.number}" is neither a rest nor pitched nor unpitched`,
            slot.id
          );
          continue;
        }

        const event = eventNode(store, eventId(slot.id, counter.next()), kind);

        const staff = getEntryStaff(entry);
        const queued = pending.get(staff) ?? [];
        pending.delete(staff);

        for (const token of [...queued, ...getNoteDynamics(entry)]) {
          addDynamic(store, event, token, dynamicNumbers.next(event.id));
        }
        for (const [text, type] of noteArticulations(entry)) {
          addArticulation(store, event, text, type, articulationNumbers.next(event.id));
        }
      }
    }
  }

  return report;
}

function addDynamic(store: NodeStore, event: GraphNode, token: string, n: number): void {
  const value = token.toLowerCase();
  const types: NodeType[] = ['mso:Dynamic', EXPRESSIVE_ELEMENT];
  if (LOUDNESS_DYNAMICS.has(value)) types.push('so:LoudnessDynamic');

  const dynamic = store.getOrCreate(dynamicId(event.id, n), types);
  dynamic.properties.set(Prop.dynamicValue, value);
  const level = DYNAMIC_LEVELS.get(value);
  if (level !== undefined) dynamic.properties.set(Prop.dynamicLevel, level);

  setRef(dynamic, Prop.isDynamicOf, event.id);
  addRef(event, Prop.hasDynamic, dynamic.id);
}

/**
 * Mapped articulations in document order, followed by one legato per slur
 * that starts on the note.
 */
function noteArticulations(note: NoteEntry): [string, ArticulationClass][] {
  const result: [string, ArticulationClass][] = [];
  for (const notation of getNotationsOfType(note, 'articulation')) {
    const type = ARTICULATION_CLASSES.get(notation.articulation);
    if (type) result.push([notation.articulation, type]);
  }
  for (const slur of getNotationsOfType(note, 'slur')) {
    if (slur.slurType === 'start') result.push(['legato', 'so:Legato']);
  }
  return result;
}

function addArticulation(
  store: NodeStore,
  event: GraphNode,
  text: string,
  type: ArticulationClass,
  n: number
): void {
  const articulation = store.getOrCreate(articulationId(event.id, n), ['mso:Articulation', EXPRESSIVE_ELEMENT, type]);
  articulation.properties.set(Prop.articulationText, text);
  setRef(articulation, Prop.isArticulationOf, event.id);
  addRef(event, Prop.hasArticulation, articulation.id);
}
