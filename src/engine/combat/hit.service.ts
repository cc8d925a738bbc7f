// Hit roll: d20 + attack level against 10 + defense level

import { Injectable } from '@nestjs/common';
import type { RngProvider } from '../rng/rng.service.js';

export interface HitResult {
  hit: boolean;
  roll: number;
  attackTotal: number;
  defenseValue: number;
  /** natural 20 that also hits */
  isCritical: boolean;
}

export const CRITICAL_ROLL = 20;

@Injectable()
export class HitService {
  /**
   * hit ⟺ roll + attackLevel >= defenseValue.
   * 1 and 20 carry no automatic outcome; 20 only marks a critical when it hits.
   */
  rollHit(attackLevel: number, defenseValue: number, rng: RngProvider): HitResult {
    const roll = rng.nextInt(1, 20);
    const attackTotal = roll + attackLevel;
    const hit = attackTotal >= defenseValue;
    return {
      hit,
      roll,
      attackTotal,
      defenseValue,
      isCritical: hit && roll === CRITICAL_ROLL,
    };
  }
}
