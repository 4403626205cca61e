import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parse } from '../src/importers';
import { NodeStore } from '../src/graph/store';
import { readGraph, writeGraph, ensureContext, toJsonValue } from '../src/graph/document';
import { NAMESPACES } from '../src/graph/vocabulary';
import { GraphDocumentError } from '../src/diagnostics';
import { buildGraph } from '../src/pipeline';

const fixturesPath = join(__dirname, 'fixtures');
const sonata = parse(readFileSync(join(fixturesPath, 'sonata.xml'), 'utf-8'));

describe('Graph document', () => {
  describe('ensureContext', () => {
    it('should add every standard prefix to an empty context', () => {
      expect(ensureContext()).toEqual({ ...NAMESPACES });
    });

    it('should keep existing bindings', () => {
      const context = ensureContext({ so: 'http://example.org/so#', ex: 'http://example.org/' });

      expect(context.so).toBe('http://example.org/so#');
      expect(context.ex).toBe('http://example.org/');
      expect(context.mso).toBe(NAMESPACES.mso);
    });
  });

  describe('readGraph', () => {
    it('should treat a missing document as an empty graph', () => {
      const result = readGraph(undefined);
      expect(result.store.size).toBe(0);
      expect(result.context).toEqual({});
      expect(result.diagnostics).toEqual([]);
    });

    it('should reject documents that are not objects', () => {
      expect(() => readGraph('graph')).toThrow(GraphDocumentError);
      expect(() => readGraph([])).toThrow('Graph document must be a JSON object');
    });

    it('should reject a "@graph" that is not a list', () => {
      expect(() => readGraph({ '@graph': {} })).toThrow('"@graph" must be a list of nodes');
    });

    it('should report entries without an id', () => {
      const result = readGraph({ '@graph': [{ '@type': 'mso:Measure' }, { '@id': 'so:X' }] });

      expect(result.store.size).toBe(1);
      expect(result.diagnostics).toEqual([
        { code: 'NODE_WITHOUT_ID', severity: 'warning', message: 'Graph entry 0 has no "@id" and was ignored' },
      ]);
    });

    it('should keep classes outside the vocabulary', () => {
      const { store } = readGraph({
        '@graph': [{ '@id': 'so:X', '@type': ['mso:Measure', 'ex:Bar'], 'ex:note': 'kept' }],
      });
      const node = store.get('so:X');

      expect(node && [...node.types]).toEqual(['mso:Measure']);
      expect(node && [...node.foreignTypes]).toEqual(['ex:Bar']);
      expect(writeGraph(store)['@graph']).toEqual([
        { '@id': 'so:X', '@type': ['mso:Measure', 'ex:Bar'], 'ex:note': 'kept' },
      ]);
    });

    it('should merge a node listed twice', () => {
      const { store } = readGraph({
        '@graph': [
          { '@id': 'so:X', '@type': 'mso:Measure', 'so:number': 1 },
          { '@id': 'so:X', '@type': 'so:StructuralElement', 'so:number': 2 },
        ],
      });
      const node = store.get('so:X');

      expect(store.size).toBe(1);
      expect(node && [...node.types]).toEqual(['mso:Measure', 'so:StructuralElement']);
      expect(node?.properties.get('so:number')).toBe(2);
    });

    it('should merge into a given store', () => {
      const store = new NodeStore();
      store.getOrCreate('so:A', ['mso:Measure']);
      readGraph({ '@graph': [{ '@id': 'so:B' }] }, store);

      expect(store.nodes().map((n) => n.id)).toEqual(['so:A', 'so:B']);
    });
  });

  describe('writeGraph', () => {
    it('should omit "@type" for nodes without classes', () => {
      const store = new NodeStore();
      store.getOrCreate('so:X', []).properties.set('so:number', 1);

      expect(writeGraph(store)['@graph']).toEqual([{ '@id': 'so:X', 'so:number': 1 }]);
    });

    it('should survive a JSON round trip unchanged', () => {
      const { store } = buildGraph(sonata, 'sonata', undefined, { sourceName: 'sonata.xml' });
      const document: unknown = JSON.parse(JSON.stringify(writeGraph(store)));

      const reread = readGraph(document);

      expect(reread.store.size).toBe(store.size);
      expect(writeGraph(reread.store, reread.context)).toEqual(writeGraph(store));
    });
  });

  it('should drop values JSON cannot carry', () => {
    expect(toJsonValue({ a: 1, b: undefined, c: [Number.NaN, 'x'] })).toEqual({ a: 1, c: ['x'] });
  });
});
