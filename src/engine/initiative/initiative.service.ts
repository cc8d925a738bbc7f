// Initiative: speed level × 10 + d20, sorted descending, stable on ties

import { Injectable } from '@nestjs/common';
import type { BattleState } from '../../db/types/index.js';
import type { RngProvider } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';

export const INITIATIVE_STAT_WEIGHT = 10;

@Injectable()
export class InitiativeService {
  constructor(private readonly stats: StatsService) {}

  /**
   * Re-rolls every participant in roster order and rewrites
   * initiative, turnOrder and currentActorId. Never incremental.
   */
  recompute(state: BattleState, rng: RngProvider): void {
    for (const p of state.participants) {
      const level = this.stats.initiativeLevel(p.combatant);
      p.initiative = level * INITIATIVE_STAT_WEIGHT + rng.nextInt(1, 20);
    }

    // Array.prototype.sort is stable: ties keep roster order
    state.turnOrder = [...state.participants]
      .sort((a, b) => b.initiative - a.initiative)
      .map((p) => p.id);
    state.currentActorId = state.turnOrder[0] ?? null;
  }
}
