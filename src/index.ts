// Core types
export type {
  Score,
  ScoreMetadata,
  Creator,
  Credit,
  PartInfo,
  Part,
  Measure,
  MeasureAttributes,
  MeasureEntry,
  NoteEntry,
  DirectionEntry,
  SoundEntry,
  AttributesEntry,
  Pitch,
  Notation,
  ArticulationType,
  DirectionType,
  DynamicsValue,
  TimeSignature,
  KeySignature,
  Clef,
} from './types';

// Importers
export { parse, parseCompressed, isCompressed, parseAuto, findRootFile } from './importers';

// Graph
export { NodeStore, ref, isNodeRef, addTypes, setRef, addRef, deleteProperty } from './graph/store';
export type { GraphNode, NodeRef, PropertyValue, JsonValue, JsonPrimitive } from './graph/store';
export { NAMESPACES, Prop, LEGACY_LCI_KEYS, isNodeType, isPitchStep, timeSignatureClass } from './graph/vocabulary';
export type {
  NodeType,
  NamespacePrefix,
  PropertyName,
  PitchStep,
  KeyMode,
  DurationClass,
  AccidentalClass,
  ArticulationClass,
  TimeSignatureClass,
  KeySignatureClass,
  KeyClass,
} from './graph/vocabulary';
export { readGraph, writeGraph, ensureContext, nodeToJson, toJsonValue } from './graph/document';
export type { GraphDocument, JsonObject, ReadGraphResult } from './graph/document';

// Identity scheme
export * from './id';

// Passes
export * from './passes';

// Complexity
export {
  computeComplexity,
  normalizeWeights,
  parseWeights,
  minMaxNormalize,
  roundTo4,
  baseDenominator,
  DEFAULT_WEIGHTS,
  METRIC_NAMES,
} from './complexity';
export type {
  ComplexityOptions,
  ComplexityReport,
  ComplexityWeights,
  MeasureComplexity,
  MeasureMetrics,
  MetricName,
  MovementComplexity,
} from './complexity';

// Pipeline
export { buildGraph, PASS_ORDER } from './pipeline';
export type { PassName, PipelineOptions, PipelineResult } from './pipeline';

// Query
export {
  getPrimaryPart,
  getStaveCount,
  iterateNotes,
  measureNumberValue,
  integerOrText,
  parseIntegerLiteral,
  refIds,
  getRefIds,
  getRefId,
  getString,
  getInteger,
  follow,
  hasType,
} from './query';

// Entry-level accessors
export {
  getDirectionOfKind,
  getDirectionsOfKind,
  getDirectionDynamics,
  getSoundTempo,
  getEntryStaff,
  isRest,
  isPitchedNote,
  isUnpitchedNote,
  classifyNote,
  getNotationsOfType,
  getNoteDynamics,
} from './entry-accessors';
export type { DirectionTypeOfKind, EventKind } from './entry-accessors';

// Diagnostics
export { MissingStructureError, GraphDocumentError, createPassReport, recordSkip } from './diagnostics';
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity, PassReport, SkipReason } from './diagnostics';

// Logging
export { consoleLogger, silentLogger, logInfo, logWarning, logError, logDebug } from './logger';
export type { Logger, LogContext } from './logger';

// File operations
export { parseFile, loadGraphFile, saveGraphFile, formatGraph } from './file';
