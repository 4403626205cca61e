import type { Score, Part, Measure } from '../types';
import { getPrimaryPart } from '../query';
import { MissingStructureError } from '../diagnostics';
import { measureId, movementId } from '../id';
import { labelOneSegmenter } from './segmenter';
import type { MovementSegment, MovementSegmenter } from './segmenter';

export interface PassOptions {
  /** Local work identifier, usually the source file's base name */
  workId: string;
  segmenter?: MovementSegmenter;
}

export interface MeasureSlot {
  measure: Measure;
  /** 0-based position in the whole measure list */
  position: number;
  id: string;
}

export interface MovementSlot {
  segment: MovementSegment;
  id: string;
  measures: MeasureSlot[];
}

/** The part a pass walks, already split into movements */
export interface ScoreTraversal {
  workId: string;
  part: Part;
  movements: MovementSlot[];
}

/**
 * Resolve the first part and its movements. Throws `MissingStructureError`
 * before any pass writes to the store when there is nothing to walk.
 */
export function prepareTraversal(score: Score, options: PassOptions): ScoreTraversal {
  const part = getPrimaryPart(score);
  if (!part) {
    throw new MissingStructureError('No <part> element found in the score');
  }
  if (part.measures.length === 0) {
    throw new MissingStructureError(`No <measure> elements found in part "${part.id}"`);
  }

  const segmenter = options.segmenter ?? labelOneSegmenter;
  const movements = segmenter.segment(part.measures).map((segment): MovementSlot => {
    const id = movementId(options.workId, segment.movementIndex);
    const measures: MeasureSlot[] = [];
    for (let position = segment.start; position < segment.end; position++) {
      const measure = part.measures[position];
      measures.push({ measure, position, id: measureId(id, measure.number, position + 1) });
    }
    return { segment, id, measures };
  });

  return { workId: options.workId, part, movements };
}
