import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parse } from '../src/importers';
import { NodeStore } from '../src/graph/store';
import { buildNotation } from '../src/passes/notation';
import { attachExpression } from '../src/passes/expression';
import type { Score } from '../src/types';

const fixturesPath = join(__dirname, 'fixtures');
const sonata = parse(readFileSync(join(fixturesPath, 'sonata.xml'), 'utf-8'));

const M1_1 = 'so:sonata_M1_Measure_1';
const M1_2 = 'so:sonata_M1_Measure_2';

function expressed(): NodeStore {
  const store = new NodeStore();
  attachExpression(store, sonata, { workId: 'sonata' });
  return store;
}

describe('Expression pass', () => {
  describe('dynamics', () => {
    it('should bind a direction to the next event on its staff', () => {
      const store = expressed();
      const dynamic = store.get(`${M1_1}_Event_000005_Dyn_1`);

      expect(dynamic && [...dynamic.types]).toEqual(['mso:Dynamic', 'so:ExpressiveElement', 'so:LoudnessDynamic']);
      expect(dynamic?.properties.get('so:dynamicValue')).toBe('p');
      expect(dynamic?.properties.get('so:dynamicLevel')).toBe(3);
      expect(dynamic?.properties.get('so:isDynamicOf')).toEqual({ '@id': `${M1_1}_Event_000005` });
      expect(store.get(`${M1_1}_Event_000005`)?.properties.get('so:hasDynamic')).toEqual([
        { '@id': `${M1_1}_Event_000005_Dyn_1` },
      ]);
    });

    it('should not bind a direction to events on other staves', () => {
      const store = expressed();
      expect(store.get(`${M1_1}_Event_000001`)?.properties.has('so:hasDynamic')).toBe(false);
    });

    it('should consume a direction with the first event that takes it', () => {
      const store = expressed();
      expect(store.get(`${M1_1}_Event_000006`)?.properties.has('so:hasDynamic')).toBe(false);
      expect(store.get(`${M1_2}_Event_000008_Dyn_1`)?.properties.get('so:dynamicValue')).toBe('ff');
    });

    it('should read dynamics written on the note', () => {
      const store = expressed();
      const dynamic = store.get('so:sonata_M2_Measure_1_Event_000013_Dyn_1');
      expect(dynamic?.properties.get('so:dynamicValue')).toBe('mf');
      expect(dynamic?.properties.get('so:dynamicLevel')).toBe(5);
    });

    it('should drop pending dynamics at the barline and keep accents untyped', () => {
      const score: Score = {
        metadata: {},
        partList: [{ id: 'P1' }],
        parts: [
          {
            id: 'P1',
            measures: [
              {
                number: '1',
                entries: [
                  { type: 'direction', staff: 1, directionTypes: [{ kind: 'dynamics', values: ['f'] }] },
                  { type: 'direction', staff: 2, directionTypes: [{ kind: 'dynamics', values: ['sfz'] }] },
                  { type: 'note', staff: 2, pitch: { step: 'C', octave: '3' }, dots: 0, noteType: 'whole' },
                ],
              },
              {
                number: '2',
                entries: [{ type: 'note', staff: 1, pitch: { step: 'C', octave: '5' }, dots: 0, noteType: 'whole' }],
              },
            ],
          },
        ],
      };
      const store = new NodeStore();
      attachExpression(store, score, { workId: 'W' });

      const accent = store.get('so:W_M1_Measure_1_Event_000001_Dyn_1');
      expect(accent && [...accent.types]).toEqual(['mso:Dynamic', 'so:ExpressiveElement']);
      expect(accent?.properties.get('so:dynamicValue')).toBe('sfz');
      expect(accent?.properties.has('so:dynamicLevel')).toBe(false);
      expect(store.get('so:W_M1_Measure_2_Event_000002')?.properties.has('so:hasDynamic')).toBe(false);
    });
  });

  describe('articulations', () => {
    it('should attach mapped articulations', () => {
      const store = expressed();
      const staccato = store.get(`${M1_1}_Event_000001_Art_1`);

      expect(staccato && [...staccato.types]).toEqual(['mso:Articulation', 'so:ExpressiveElement', 'so:Staccato']);
      expect(staccato?.properties.get('so:articulationText')).toBe('staccato');
      expect(staccato?.properties.get('so:isArticulationOf')).toEqual({ '@id': `${M1_1}_Event_000001` });
      expect(store.get('so:sonata_M2_Measure_2_Event_000015_Art_1')?.types.has('so:Accent')).toBe(true);
    });

    it('should add a legato where a slur starts', () => {
      const store = expressed();
      const legato = store.get(`${M1_2}_Event_000009_Art_1`);

      expect(legato?.types.has('so:Legato')).toBe(true);
      expect(legato?.properties.get('so:articulationText')).toBe('legato');
      expect(store.get(`${M1_2}_Event_000010_Art_1`)?.types.has('so:Staccato')).toBe(true);
      expect(store.has(`${M1_2}_Event_000010_Art_2`)).toBe(false);
    });
  });

  it('should create events on its own with the notation pass ids', () => {
    const store = expressed();
    const rest = store.get(`${M1_1}_Event_000003`);
    expect(rest && [...rest.types]).toEqual(['ho:SymbolicEvent', 'so:MusicNotationElement', 'mso:Rest']);
    expect(store.nodesOfType('ho:SymbolicEvent')).toHaveLength(16);
  });

  it('should merge into events built by the notation pass', () => {
    const store = new NodeStore();
    buildNotation(store, sonata, { workId: 'sonata' });
    const before = store.size;
    const events = store.nodesOfType('ho:SymbolicEvent').length;

    attachExpression(store, sonata, { workId: 'sonata' });

    expect(store.nodesOfType('ho:SymbolicEvent')).toHaveLength(events);
    expect(store.size - before).toBe(7);
  });

  it('should keep feature ids stable across runs', () => {
    const store = expressed();
    const size = store.size;
    const report = attachExpression(store, sonata, { workId: 'sonata' });

    expect(store.size).toBe(size);
    expect(store.get(`${M1_1}_Event_000005`)?.properties.get('so:hasDynamic')).toEqual([
      { '@id': `${M1_1}_Event_000005_Dyn_1` },
    ]);
    expect(report.skipped).toEqual({ 'unclassified-event': 1, 'incomplete-pitch': 0 });
  });
});
