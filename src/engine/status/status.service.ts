// Status effects: unique by name per combatant, no ticking in the core

import { Injectable } from '@nestjs/common';
import type { Combatant, StatusEffect } from '../../db/types/index.js';

export interface ApplyStatusResult {
  /** an effect with the same name was replaced */
  replaced: boolean;
  effects: StatusEffect[];
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

@Injectable()
export class StatusService {
  /** creatures: statusEffects, handlers: conditions */
  effectsOf(combatant: Combatant): StatusEffect[] {
    return combatant.type === 'creature' ? combatant.statusEffects : combatant.conditions;
  }

  /** adds the effect, replacing any existing effect of the same name in place */
  apply(combatant: Combatant, effect: StatusEffect): ApplyStatusResult {
    const current = this.effectsOf(combatant);
    const index = current.findIndex((e) => sameName(e.name, effect.name));
    const updated = [...current];
    if (index >= 0) {
      updated[index] = { ...effect };
    } else {
      updated.push({ ...effect });
    }
    this.write(combatant, updated);
    return { replaced: index >= 0, effects: updated };
  }

  remove(combatant: Combatant, name: string): boolean {
    const current = this.effectsOf(combatant);
    const remaining = current.filter((e) => !sameName(e.name, name));
    if (remaining.length === current.length) return false;
    this.write(combatant, remaining);
    return true;
  }

  private write(combatant: Combatant, effects: StatusEffect[]): void {
    if (combatant.type === 'creature') {
      combatant.statusEffects = effects;
    } else {
      combatant.conditions = effects;
    }
  }
}
