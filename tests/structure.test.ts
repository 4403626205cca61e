import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { parse } from '../src/importers';
import { NodeStore } from '../src/graph/store';
import { writeGraph } from '../src/graph/document';
import { buildStructure } from '../src/passes/structure';
import type { Measure, Score } from '../src/types';

const fixturesPath = join(__dirname, 'fixtures');
const sonata = parse(readFileSync(join(fixturesPath, 'sonata.xml'), 'utf-8'));

function scoreWithStaves(staves: number, labels: string[]): Score {
  const list: Measure[] = labels.map((number, i) => ({
    number,
    attributes: i === 0 ? { staves } : undefined,
    entries: [],
  }));
  return { metadata: {}, partList: [{ id: 'P1' }], parts: [{ id: 'P1', measures: list }] };
}

describe('Structure pass', () => {
  it('should link the work to its movements', () => {
    const store = new NodeStore();
    buildStructure(store, sonata, { workId: 'sonata' });

    const work = store.get('so:sonata');
    expect(work && [...work.types]).toEqual(['mo:MusicalWork', 'so:Sonata']);
    expect(work?.properties.get('so:hasMovement')).toEqual([{ '@id': 'so:sonata_M1' }, { '@id': 'so:sonata_M2' }]);

    const movement = store.get('so:sonata_M2');
    expect(movement && [...movement.types]).toEqual(['mso:Movement', 'so:SonataMovement', 'so:StructuralElement']);
    expect(movement?.properties.get('so:movementIndex')).toBe(2);
  });

  it('should create upper and lower piano staves for a two-staff part', () => {
    const store = new NodeStore();
    buildStructure(store, sonata, { workId: 'sonata' });

    const upper = store.get('so:sonata_M1_Staff_1');
    const lower = store.get('so:sonata_M1_Staff_2');
    expect(upper?.types.has('so:UpperPianoStaff')).toBe(true);
    expect(lower?.types.has('so:LowerPianoStaff')).toBe(true);
    expect(lower?.properties.get('so:staffIndex')).toBe(2);

    const movement = store.get('so:sonata_M1');
    const staves = [{ '@id': 'so:sonata_M1_Staff_1' }, { '@id': 'so:sonata_M1_Staff_2' }];
    expect(movement?.properties.get('so:movementHasStaff')).toEqual(staves);
    expect(movement?.properties.get('so:sonataMovementHasPianoStaff')).toEqual(staves);
  });

  it('should not mark upper or lower staves unless there are exactly two', () => {
    for (const count of [1, 3]) {
      const store = new NodeStore();
      buildStructure(store, scoreWithStaves(count, ['1']), { workId: 'W' });

      const staves = store.nodesOfType('mso:Staff');
      expect(staves).toHaveLength(count);
      for (const staff of staves) {
        expect([...staff.types]).toEqual(['mso:Staff', 'so:PianoStaff', 'so:StructuralElement']);
      }
    }
  });

  it('should link every measure to every staff of its movement', () => {
    const store = new NodeStore();
    buildStructure(store, sonata, { workId: 'sonata' });

    const measure = store.get('so:sonata_M2_Measure_2');
    expect(measure?.properties.get('so:isMeasureOfStaff')).toEqual([
      { '@id': 'so:sonata_M2_Staff_1' },
      { '@id': 'so:sonata_M2_Staff_2' },
    ]);
    expect(store.get('so:sonata_M2_Staff_2')?.properties.get('so:staffHasMeasure')).toEqual([
      { '@id': 'so:sonata_M2_Measure_1' },
      { '@id': 'so:sonata_M2_Measure_2' },
    ]);
    expect(store.get('so:sonata_M1')?.properties.get('so:movementHasMeasure')).toEqual([
      { '@id': 'so:sonata_M1_Measure_1' },
      { '@id': 'so:sonata_M1_Measure_2' },
    ]);
  });

  it('should write integer labels as numbers and keep other labels as text', () => {
    const store = new NodeStore();
    buildStructure(store, scoreWithStaves(1, ['1', '12a', '']), { workId: 'W' });

    expect(store.get('so:W_M1_Measure_1')?.properties.get('so:number')).toBe(1);
    expect(store.get('so:W_M1_Measure_12a')?.properties.get('so:number')).toBe('12a');
    expect(store.get('so:W_M1_Measure_3')?.properties.get('so:number')).toBe(3);
  });

  it('should keep an existing measure number', () => {
    const store = new NodeStore();
    store.getOrCreate('so:W_M1_Measure_1', ['mso:Measure']).properties.set('so:number', 'first');
    buildStructure(store, scoreWithStaves(1, ['1']), { workId: 'W' });

    expect(store.get('so:W_M1_Measure_1')?.properties.get('so:number')).toBe('first');
  });

  it('should be idempotent', () => {
    const store = new NodeStore();
    buildStructure(store, sonata, { workId: 'sonata' });
    const first = JSON.stringify(writeGraph(store));
    const size = store.size;

    buildStructure(store, sonata, { workId: 'sonata' });

    expect(store.size).toBe(size);
    expect(JSON.stringify(writeGraph(store))).toBe(first);
  });

  it('should report nothing skipped', () => {
    const report = buildStructure(new NodeStore(), sonata, { workId: 'sonata' });
    expect(report.pass).toBe('structure');
    expect(report.skipped).toEqual({ 'unclassified-event': 0, 'incomplete-pitch': 0 });
  });
});
