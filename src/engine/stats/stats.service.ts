// Effective stat levels: base level + temporary modifiers

import { Injectable } from '@nestjs/common';
import type { Combatant, StatBlock, StatName } from '../../db/types/index.js';
import { STAT_NAME } from '../../db/types/index.js';

@Injectable()
export class StatsService {
  /** base stats with every temporary modifier folded in (creatures only carry modifiers) */
  buildSnapshot(combatant: Combatant): StatBlock {
    const snap: StatBlock = { ...combatant.stats };
    if (combatant.type === 'creature') {
      for (const stat of STAT_NAME) {
        snap[stat] += combatant.statModifiers[stat] ?? 0;
      }
    }
    return snap;
  }

  level(combatant: Combatant, stat: StatName): number {
    return this.buildSnapshot(combatant)[stat];
  }

  /** Mind for special moves, Power otherwise */
  attackLevel(combatant: Combatant, isSpecialMove: boolean): number {
    return this.level(combatant, isSpecialMove ? 'mind' : 'power');
  }

  /** hit threshold: 10 + Spirit for special moves, 10 + Defense otherwise */
  defenseValue(combatant: Combatant, isSpecialMove: boolean): number {
    return 10 + this.level(combatant, isSpecialMove ? 'spirit' : 'defense');
  }

  /** agility-equivalent level that drives initiative */
  initiativeLevel(combatant: Combatant): number {
    return this.level(combatant, 'speed');
  }
}
