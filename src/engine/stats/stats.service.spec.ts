import { StatsService } from './stats.service.js';
import { makeCreature, makeHandler, makeStats } from '../../test-helpers/make-participant.js';

describe('StatsService', () => {
  let service: StatsService;

  beforeEach(() => {
    service = new StatsService();
  });

  describe('buildSnapshot', () => {
    it('returns base stats when there are no modifiers', () => {
      const creature = makeCreature({ stats: makeStats({ power: 3, defense: 2 }) });
      expect(service.buildSnapshot(creature)).toEqual(makeStats({ power: 3, defense: 2 }));
    });

    it('adds temporary modifiers to the matching stat', () => {
      const creature = makeCreature({
        stats: makeStats({ power: 3, speed: 2 }),
        statModifiers: { power: 2, speed: -1 },
      });
      const snap = service.buildSnapshot(creature);
      expect(snap.power).toBe(5);
      expect(snap.speed).toBe(1);
      expect(snap.mind).toBe(1);
    });

    it('does not mutate the combatant stats', () => {
      const creature = makeCreature({ stats: makeStats({ power: 3 }), statModifiers: { power: 4 } });
      service.buildSnapshot(creature);
      expect(creature.stats.power).toBe(3);
    });

    it('handlers use their stats as-is', () => {
      const handler = makeHandler({ stats: makeStats({ speed: 4 }) });
      expect(service.buildSnapshot(handler).speed).toBe(4);
    });
  });

  describe('attack / defense selection', () => {
    const creature = makeCreature({
      stats: makeStats({ power: 3, mind: 5, defense: 1, spirit: 4 }),
    });

    it('physical move → Power', () => {
      expect(service.attackLevel(creature, false)).toBe(3);
    });

    it('special move → Mind', () => {
      expect(service.attackLevel(creature, true)).toBe(5);
    });

    it('physical defense value = 10 + Defense', () => {
      expect(service.defenseValue(creature, false)).toBe(11);
    });

    it('special defense value = 10 + Spirit', () => {
      expect(service.defenseValue(creature, true)).toBe(14);
    });
  });

  it('initiativeLevel reads Speed including modifiers', () => {
    const creature = makeCreature({ stats: makeStats({ speed: 2 }), statModifiers: { speed: 1 } });
    expect(service.initiativeLevel(creature)).toBe(3);
  });
});
