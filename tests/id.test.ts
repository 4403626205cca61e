import { describe, it, expect } from 'vitest';
import {
  workIdFromPath,
  workNodeId,
  movementId,
  staffId,
  clefId,
  measureId,
  sanitizeMeasureLabel,
  eventId,
  formatOrdinal,
  pitchId,
  accidentalId,
  dynamicId,
  articulationId,
  tempoId,
  lciId,
  gcpId,
  EventCounter,
} from '../src/id';

describe('Identity scheme', () => {
  describe('workIdFromPath', () => {
    it('should strip directories and the last extension', () => {
      expect(workIdFromPath('scores/Sonata1.xml')).toBe('Sonata1');
      expect(workIdFromPath('C:\\scores\\Sonata1.musicxml')).toBe('Sonata1');
      expect(workIdFromPath('archive.v2.mxl')).toBe('archive.v2');
    });

    it('should keep names without an extension', () => {
      expect(workIdFromPath('Sonata1')).toBe('Sonata1');
      expect(workIdFromPath('.hidden')).toBe('.hidden');
    });
  });

  describe('sanitizeMeasureLabel', () => {
    it('should keep letters and digits', () => {
      expect(sanitizeMeasureLabel('12a', 5)).toBe('12a');
    });

    it('should replace every other code point with an underscore', () => {
      expect(sanitizeMeasureLabel('X1.5', 3)).toBe('X1_5');
      expect(sanitizeMeasureLabel('1 - 2', 3)).toBe('1___2');
    });

    it('should keep non-ASCII letters', () => {
      expect(sanitizeMeasureLabel('Ü3', 1)).toBe('Ü3');
    });

    it('should fall back to the position when the label is empty', () => {
      expect(sanitizeMeasureLabel('', 7)).toBe('7');
      expect(sanitizeMeasureLabel(undefined, 2)).toBe('2');
    });
  });

  describe('node ids', () => {
    const movement = movementId('Sonata1', 2);

    it('should nest movement, staff and clef ids under the work', () => {
      expect(workNodeId('Sonata1')).toBe('so:Sonata1');
      expect(movement).toBe('so:Sonata1_M2');
      expect(staffId(movement, 1)).toBe('so:Sonata1_M2_Staff_1');
      expect(clefId(movement, 2)).toBe('so:Sonata1_M2_Staff_2_Clef');
    });

    it('should build measure ids from sanitized labels', () => {
      expect(measureId(movement, '12a', 40)).toBe('so:Sonata1_M2_Measure_12a');
      expect(measureId(movement, '', 40)).toBe('so:Sonata1_M2_Measure_40');
    });

    it('should zero-pad event ordinals to six digits', () => {
      expect(formatOrdinal(42)).toBe('000042');
      expect(formatOrdinal(1234567)).toBe('1234567');
      const measure = measureId(movement, '12a', 40);
      expect(eventId(measure, 42)).toBe('so:Sonata1_M2_Measure_12a_Event_000042');
    });

    it('should suffix sub-feature ids on their owner', () => {
      const event = 'so:W_M1_Measure_1_Event_000001';
      expect(pitchId(event)).toBe(`${event}_Pitch`);
      expect(accidentalId(event)).toBe(`${event}_Accidental`);
      expect(dynamicId(event, 2)).toBe(`${event}_Dyn_2`);
      expect(articulationId(event, 1)).toBe(`${event}_Art_1`);
      expect(tempoId('so:W_M1_Measure_1', 3)).toBe('so:W_M1_Measure_1_Tempo_3');
      expect(lciId('so:W_M1_Measure_1')).toBe('so:W_M1_Measure_1_LCI');
      expect(gcpId('so:W_M1')).toBe('so:W_M1_GCP');
    });
  });

  describe('EventCounter', () => {
    it('should count from 1', () => {
      const counter = new EventCounter();
      expect(counter.current).toBe(0);
      expect(counter.next()).toBe(1);
      expect(counter.next()).toBe(2);
      expect(counter.current).toBe(2);
    });
  });
});
