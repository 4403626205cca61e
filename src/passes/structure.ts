import type { Score } from '../types';
import { addRef } from '../graph/store';
import type { GraphNode, NodeStore } from '../graph/store';
import { Prop } from '../graph/vocabulary';
import type { NodeType } from '../graph/vocabulary';
import { staffId, workNodeId } from '../id';
import { getStaveCount, measureNumberValue } from '../query';
import { createPassReport } from '../diagnostics';
import type { PassReport } from '../diagnostics';
import { prepareTraversal } from './context';
import type { PassOptions } from './context';

const WORK_TYPES: readonly NodeType[] = ['mo:MusicalWork', 'so:Sonata'];
const MOVEMENT_TYPES: readonly NodeType[] = ['mso:Movement', 'so:SonataMovement', 'so:StructuralElement'];
const STAFF_TYPES: readonly NodeType[] = ['mso:Staff', 'so:PianoStaff', 'so:StructuralElement'];
const MEASURE_TYPES: readonly NodeType[] = ['mso:Measure', 'so:StructuralElement'];

function staffTypes(staffIndex: number, staffCount: number): readonly NodeType[] {
  if (staffCount !== 2) return STAFF_TYPES;
  return [...STAFF_TYPES, staffIndex === 1 ? 'so:UpperPianoStaff' : 'so:LowerPianoStaff'];
}

/**
 * Build the Work → Movement → Staff / Measure skeleton.
 *
 * Every link is appended without duplicates, so running the pass again on
 * a populated store leaves node count and edge sets unchanged.
 */
export function buildStructure(store: NodeStore, score: Score, options: PassOptions): PassReport {
  const traversal = prepareTraversal(score, options);
  const report = createPassReport('structure');
  const staffCount = getStaveCount(traversal.part);

  const work = store.getOrCreate(workNodeId(traversal.workId), WORK_TYPES);

  for (const movement of traversal.movements) {
    const movementNode = store.getOrCreate(movement.id, MOVEMENT_TYPES);
    movementNode.properties.set(Prop.movementIndex, movement.segment.movementIndex);
    addRef(work, Prop.hasMovement, movement.id);

    const staves: GraphNode[] = [];
    for (let s = 1; s <= staffCount; s++) {
      const staff = store.getOrCreate(staffId(movement.id, s), staffTypes(s, staffCount));
      staff.properties.set(Prop.staffIndex, s);
      addRef(movementNode, Prop.movementHasStaff, staff.id);
      addRef(movementNode, Prop.sonataMovementHasPianoStaff, staff.id);
      staves.push(staff);
    }

    for (const slot of movement.measures) {
      const measure = store.getOrCreate(slot.id, MEASURE_TYPES);
      if (!measure.properties.has(Prop.number)) {
        measure.properties.set(Prop.number, measureNumberValue(slot.measure.number, slot.position + 1));
      }
      addRef(movementNode, Prop.movementHasMeasure, measure.id);
      for (const staff of staves) {
        addRef(measure, Prop.isMeasureOfStaff, staff.id);
        addRef(staff, Prop.staffHasMeasure, measure.id);
      }
    }
  }

  return report;
}
