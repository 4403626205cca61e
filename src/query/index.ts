import type { Score, Part, Measure, NoteEntry } from '../types';
import { isNodeRef } from '../graph/store';
import type { GraphNode, NodeStore, PropertyValue } from '../graph/store';
import type { NodeType } from '../graph/vocabulary';

// ============================================================
// Score queries
// ============================================================

/**
 * Get the part the graph is built from. Only the first part is read.
 */
export function getPrimaryPart(score: Score): Part | undefined {
  return score.parts[0];
}

/**
 * Get the number of staves for a part: the first positive `<staves>` in a
 * measure's first attributes block, else the highest staff any note
 * references, else 2.
 */
export function getStaveCount(part: Part): number {
  for (const measure of part.measures) {
    const staves = measure.attributes?.staves;
    if (staves !== undefined && staves > 0) {
      return staves;
    }
  }

  let maxStaff = 0;
  for (const note of iterateNotes(part.measures)) {
    if (note.staff !== undefined && note.staff > maxStaff) {
      maxStaff = note.staff;
    }
  }
  if (maxStaff > 0) return maxStaff;

  return 2;
}

/**
 * Iterate every note entry of the given measures in document order,
 * chord members and grace notes included.
 */
export function* iterateNotes(measures: readonly Measure[]): Generator<NoteEntry> {
  for (const measure of measures) {
    for (const entry of measure.entries) {
      if (entry.type === 'note') yield entry;
    }
  }
}

/**
 * Value of a measure label for `so:number`: the integer when the label is an
 * integer literal, the label itself otherwise, the 1-based position when the
 * label is empty.
 */
export function measureNumberValue(label: string, position: number): number | string {
  if (label === '') return position;
  return integerOrText(label);
}

/** Integer value of an integer literal; any other text is kept as written. */
export function integerOrText(value: string): number | string {
  return parseIntegerLiteral(value) ?? value;
}

/** Parse an integer literal; anything else (including "3+2" or "4.5") is undefined. */
export function parseIntegerLiteral(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*[+-]?\d+\s*$/.test(value)) return undefined;
  return parseInt(value, 10);
}

// ============================================================
// Graph queries
// ============================================================

/**
 * Ids referenced by a property value: one reference, a list of references,
 * or a bare id string as some JSON-LD writers emit.
 */
export function refIds(value: PropertyValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value.filter(isNodeRef).map((item) => item['@id']);
  }
  if (typeof value === 'string') return [value];
  return isNodeRef(value) ? [value['@id']] : [];
}

export function getRefIds(node: GraphNode, key: string): string[] {
  return refIds(node.properties.get(key));
}

/** First id referenced by `key`, if any */
export function getRefId(node: GraphNode, key: string): string | undefined {
  return getRefIds(node, key)[0];
}

export function getString(node: GraphNode, key: string): string | undefined {
  const value = node.properties.get(key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Integer value of a property that may hold a number or a numeric string
 * (graph documents written by other tools store either).
 */
export function getInteger(node: GraphNode, key: string): number | undefined {
  const value = node.properties.get(key);
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  if (typeof value === 'string') return parseIntegerLiteral(value);
  return undefined;
}

/** Resolve the node a reference property points at, when it exists in the store. */
export function follow(store: NodeStore, node: GraphNode, key: string): GraphNode | undefined {
  const id = getRefId(node, key);
  return id === undefined ? undefined : store.get(id);
}

export function hasType(node: GraphNode, type: NodeType): boolean {
  return node.types.has(type);
}
