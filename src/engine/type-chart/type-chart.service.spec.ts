import { TypeChartService } from './type-chart.service.js';
import { CREATURE_TYPE } from '../../db/types/index.js';

describe('TypeChartService', () => {
  let chart: TypeChartService;

  beforeEach(() => {
    chart = new TypeChartService();
  });

  describe('single', () => {
    it('super effective pair → 2', () => {
      expect(chart.single('FIRE', 'GRASS')).toBe(2);
      expect(chart.single('WATER', 'FIRE')).toBe(2);
    });

    it('resisted pair → 0.5', () => {
      expect(chart.single('FIRE', 'WATER')).toBe(0.5);
    });

    it('immune pair → 0', () => {
      expect(chart.single('ELECTRIC', 'GROUND')).toBe(0);
      expect(chart.single('NORMAL', 'GHOST')).toBe(0);
    });

    it('pair absent from the chart → 1', () => {
      expect(chart.single('NORMAL', 'NORMAL')).toBe(1);
      expect(chart.single('FIRE', 'ELECTRIC')).toBe(1);
    });
  });

  describe('effectiveness (dual type)', () => {
    it('no second type → single lookup', () => {
      expect(chart.effectiveness('FIRE', 'GRASS')).toBe(2);
    });

    it('multiplies both lookups', () => {
      expect(chart.effectiveness('ICE', 'GRASS', 'FLYING')).toBe(4);
      expect(chart.effectiveness('FIRE', 'WATER', 'DRAGON')).toBe(0.25);
      expect(chart.effectiveness('FIRE', 'GRASS', 'WATER')).toBe(1);
      expect(chart.effectiveness('GROUND', 'FIRE', 'FLYING')).toBe(0);
    });

    it('is order-independent for every type pair', () => {
      for (const attack of CREATURE_TYPE) {
        for (const a of CREATURE_TYPE) {
          for (const b of CREATURE_TYPE) {
            expect(chart.effectiveness(attack, a, b)).toBe(chart.effectiveness(attack, b, a));
          }
        }
      }
    });

    it('only produces values from the dual-type set', () => {
      const allowed = new Set([0, 0.25, 0.5, 1, 2, 4]);
      for (const attack of CREATURE_TYPE) {
        for (const a of CREATURE_TYPE) {
          for (const b of CREATURE_TYPE) {
            expect(allowed.has(chart.effectiveness(attack, a, b))).toBe(true);
          }
        }
      }
    });
  });

  describe('derived queries', () => {
    it('superEffectiveAgainst scans the chart in type order', () => {
      expect(chart.superEffectiveAgainst('FIRE')).toEqual(['GRASS', 'ICE', 'BUG', 'STEEL']);
    });

    it('notVeryEffectiveAgainst', () => {
      expect(chart.notVeryEffectiveAgainst('FIRE')).toEqual(['FIRE', 'WATER', 'ROCK', 'DRAGON']);
    });

    it('noEffectAgainst', () => {
      expect(chart.noEffectAgainst('NORMAL')).toEqual(['GHOST']);
      expect(chart.noEffectAgainst('FIRE')).toEqual([]);
    });
  });

  describe('describe', () => {
    it.each([
      [0, 'No Effect'],
      [0.25, 'Not Very Effective'],
      [0.5, 'Not Very Effective'],
      [1, 'Normal Effectiveness'],
      [2, 'Super Effective'],
      [4, 'Super Effective'],
    ])('%p → %s', (multiplier, label) => {
      expect(chart.describe(multiplier)).toBe(label);
    });
  });
});
