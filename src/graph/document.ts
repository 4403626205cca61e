import { NAMESPACES, isNodeType } from './vocabulary';
import { NodeStore } from './store';
import type { GraphNode, JsonValue } from './store';
import { GraphDocumentError } from '../diagnostics';
import type { Diagnostic } from '../diagnostics';

export type JsonObject = { [key: string]: JsonValue };

export interface GraphDocument {
  '@context': JsonObject;
  '@graph': JsonObject[];
}

export interface ReadGraphResult {
  store: NodeStore;
  context: JsonObject;
  diagnostics: Diagnostic[];
}

// ============================================================
// JSON narrowing
// ============================================================

function isJsonObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Copy an untyped value into a `JsonValue`; anything JSON cannot carry is dropped. */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted !== undefined) result[key] = converted;
    }
    return result;
  }
  return undefined;
}

// ============================================================
// Context
// ============================================================

/**
 * Add every standard prefix the context lacks. Existing entries, including
 * ones that bind a standard prefix to another IRI, are kept.
 */
export function ensureContext(context: JsonObject = {}): JsonObject {
  const result: JsonObject = { ...context };
  for (const [prefix, iri] of Object.entries(NAMESPACES)) {
    if (!(prefix in result)) {
      result[prefix] = iri;
    }
  }
  return result;
}

// ============================================================
// Read
// ============================================================

function typeNames(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

/**
 * Load a JSON-LD graph document into a node store. A missing document
 * (`undefined` or `null`) yields an empty graph.
 *
 * Nodes keep their order of first appearance. A node listed twice is merged
 * the way the store merges: types accumulate, later properties win.
 */
export function readGraph(document: unknown, store: NodeStore = new NodeStore()): ReadGraphResult {
  const diagnostics: Diagnostic[] = [];

  if (document === undefined || document === null) {
    return { store, context: {}, diagnostics };
  }
  if (!isJsonObject(document)) {
    throw new GraphDocumentError('Graph document must be a JSON object');
  }

  const rawGraph = document['@graph'] ?? [];
  if (!Array.isArray(rawGraph)) {
    throw new GraphDocumentError('"@graph" must be a list of nodes');
  }
  const graph: unknown[] = rawGraph;

  const rawContext = toJsonValue(document['@context']);
  const context: JsonObject =
    typeof rawContext === 'object' && rawContext !== null && !Array.isArray(rawContext) ? rawContext : {};

  graph.forEach((item, index) => {
    const id = isJsonObject(item) ? item['@id'] : undefined;
    if (!isJsonObject(item) || typeof id !== 'string') {
      diagnostics.push({
        code: 'NODE_WITHOUT_ID',
        severity: 'warning',
        message: `Graph entry ${index} has no "@id" and was ignored`,
      });
      return;
    }

    const names = typeNames(item['@type']);
    const node = store.getOrCreate(id, names.filter(isNodeType));
    for (const name of names) {
      if (!isNodeType(name)) node.foreignTypes.add(name);
    }

    for (const [key, value] of Object.entries(item)) {
      if (key === '@id' || key === '@type') continue;
      const converted = toJsonValue(value);
      if (converted !== undefined) node.properties.set(key, converted);
    }
  });

  return { store, context, diagnostics };
}

// ============================================================
// Write
// ============================================================

export function nodeToJson(node: GraphNode): JsonObject {
  const json: JsonObject = { '@id': node.id };
  const types = [...node.types, ...node.foreignTypes];
  if (types.length > 0) {
    json['@type'] = types;
  }
  for (const [key, value] of node.properties) {
    json[key] = value;
  }
  return json;
}

/** Serialize the store in insertion order under a completed context. */
export function writeGraph(store: NodeStore, context: JsonObject = {}): GraphDocument {
  return {
    '@context': ensureContext(context),
    '@graph': store.nodes().map(nodeToJson),
  };
}
