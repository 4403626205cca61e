export { labelOneSegmenter, singleMovementSegmenter } from './segmenter';
export type { MovementSegment, MovementSegmenter } from './segmenter';
export { prepareTraversal } from './context';
export type { PassOptions, ScoreTraversal, MovementSlot, MeasureSlot } from './context';
export {
  buildMetadata,
  firstKeySignature,
  describeKey,
  workTitle,
  workComposer,
  instrumentLabel,
} from './metadata';
export type { KeyInference, KeyEstimate, KeyDescription, MetadataOptions } from './metadata';
export { buildStructure } from './structure';
export { buildNotation, durationClass, accidentalInfo, eventNode } from './notation';
export type { AccidentalInfo } from './notation';
export { attachExpression, LOUDNESS_DYNAMICS, DYNAMIC_LEVELS } from './expression';
