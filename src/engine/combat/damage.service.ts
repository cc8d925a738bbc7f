// Damage: (move dice + bonus dice) × d6, critical ×1.5, then type multiplier

import { Injectable } from '@nestjs/common';
import type { RngProvider } from '../rng/rng.service.js';

export const CRITICAL_MULTIPLIER = 1.5;

export interface DamageInput {
  numDamageDice: number;
  attackLevel: number;
  isCritical: boolean;
  /** type effectiveness, one of 0, 0.25, 0.5, 1, 2, 4 */
  multiplier: number;
}

export interface DamageResult {
  diceRolls: number[];
  bonusDice: number;
  /** sum of dice before critical and type scaling */
  baseDamage: number;
  damage: number;
}

@Injectable()
export class DamageService {
  bonusDice(attackLevel: number): number {
    return Math.max(0, Math.floor(attackLevel / 2));
  }

  rollDamage(input: DamageInput, rng: RngProvider): DamageResult {
    const bonusDice = this.bonusDice(input.attackLevel);
    const totalDice = input.numDamageDice + bonusDice;

    const diceRolls: number[] = [];
    for (let i = 0; i < totalDice; i++) {
      diceRolls.push(rng.nextInt(1, 6));
    }
    const baseDamage = diceRolls.reduce((sum, d) => sum + d, 0);

    const afterCrit = input.isCritical
      ? Math.floor(baseDamage * CRITICAL_MULTIPLIER)
      : baseDamage;

    let damage = Math.floor(afterCrit * input.multiplier);
    if (input.multiplier > 0) damage = Math.max(1, damage);

    return { diceRolls, bonusDice, baseDamage, damage };
  }
}
