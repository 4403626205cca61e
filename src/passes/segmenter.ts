import type { Measure } from '../types';

/**
 * A contiguous run of measures forming one movement.
 * `start` is inclusive and `end` exclusive, both positions in the part's
 * measure list.
 */
export interface MovementSegment {
  /** 1-based, in document order */
  movementIndex: number;
  start: number;
  end: number;
}

/**
 * Strategy for splitting a part's measures into movements. Segments are
 * returned in document order and never overlap; measures outside every
 * segment are left out of the graph.
 */
export interface MovementSegmenter {
  segment(measures: readonly Measure[]): MovementSegment[];
}

/**
 * Every measure labelled exactly "1" opens a movement that runs up to the
 * next one. A part that never labels a measure "1" is a single movement from
 * position 0. Measures before the first "1" (a pickup labelled "0") belong
 * to no movement.
 */
export const labelOneSegmenter: MovementSegmenter = {
  segment(measures) {
    const starts: number[] = [];
    measures.forEach((measure, position) => {
      if (measure.number === '1') starts.push(position);
    });

    if (starts.length === 0) {
      return [{ movementIndex: 1, start: 0, end: measures.length }];
    }

    return starts.map((start, i) => ({
      movementIndex: i + 1,
      start,
      end: i + 1 < starts.length ? starts[i + 1] : measures.length,
    }));
  },
};

/**
 * A whole part as one movement, for scores whose numbering restarts
 * without starting a new movement.
 */
export const singleMovementSegmenter: MovementSegmenter = {
  segment(measures) {
    return [{ movementIndex: 1, start: 0, end: measures.length }];
  },
};
