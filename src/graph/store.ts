import type { NodeType } from './vocabulary';

// ============================================================
// Values
// ============================================================
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Reference to another node, stored the JSON-LD way */
export type NodeRef = { '@id': string };

export type PropertyValue = JsonValue;

export interface GraphNode {
  readonly id: string;
  /** Vocabulary classes; union-only */
  readonly types: Set<NodeType>;
  /** Classes read from a document that are not part of the vocabulary, kept verbatim */
  readonly foreignTypes: Set<string>;
  /** Last write wins per key */
  readonly properties: Map<string, PropertyValue>;
}

export function ref(id: string): NodeRef {
  return { '@id': id };
}

export function isNodeRef(value: unknown): value is NodeRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    '@id' in value &&
    typeof value['@id'] === 'string'
  );
}

// ============================================================
// Node Store
// ============================================================

/**
 * Append-only, id-indexed collection of graph nodes.
 *
 * Passes never share state other than this store: two passes cooperate only
 * by computing the same id for the same entity and calling `getOrCreate`.
 * Iteration follows insertion order, which is also the output order.
 */
export class NodeStore {
  private readonly byId = new Map<string, GraphNode>();

  /**
   * Return the node with `id`, creating it with `baseTypes` when absent.
   * An existing node gets `baseTypes` merged into its types; its properties
   * are left untouched.
   */
  getOrCreate(id: string, baseTypes: readonly NodeType[]): GraphNode {
    const existing = this.byId.get(id);
    if (existing) {
      addTypes(existing, baseTypes);
      return existing;
    }

    const node: GraphNode = {
      id,
      types: new Set(baseTypes),
      foreignTypes: new Set(),
      properties: new Map(),
    };
    this.byId.set(id, node);
    return node;
  }

  get(id: string): GraphNode | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  get size(): number {
    return this.byId.size;
  }

  nodes(): GraphNode[] {
    return [...this.byId.values()];
  }

  nodesOfType(type: NodeType): GraphNode[] {
    return this.nodes().filter((node) => node.types.has(type));
  }
}

// ============================================================
// Node mutation helpers
// ============================================================

export function addTypes(node: GraphNode, types: readonly NodeType[]): void {
  for (const type of types) {
    node.types.add(type);
  }
}

/** Only schema maintenance removes keys; nodes themselves are never deleted. */
export function deleteProperty(node: GraphNode, key: string): boolean {
  return node.properties.delete(key);
}

/** Single-valued reference: `{ "@id": targetId }` */
export function setRef(node: GraphNode, key: string, targetId: string): void {
  node.properties.set(key, ref(targetId));
}

/**
 * Multi-valued reference. The current value may be missing, a single
 * reference, a bare id string read from a document, or a list; the result
 * is always a list without duplicate ids.
 */
export function addRef(node: GraphNode, key: string, targetId: string): void {
  const current = node.properties.get(key);
  let refs: JsonValue[];
  if (Array.isArray(current)) {
    refs = current;
  } else if (isNodeRef(current)) {
    refs = [current];
  } else if (typeof current === 'string') {
    refs = [ref(current)];
  } else {
    refs = [];
  }

  if (!refs.some((item) => isNodeRef(item) && item['@id'] === targetId)) {
    refs.push(ref(targetId));
  }
  node.properties.set(key, refs);
}
