import type { BattleState } from '../../db/types/index.js';
import type { RngProvider } from '../rng/rng.service.js';

export const BATTLE_EFFECTS_HOOK = Symbol('BATTLE_EFFECTS_HOOK');

/**
 * Status ticks, hazards and weather belong to the ruleset. When bound,
 * this runs on every transition into APPLY_EFFECTS and may mutate the
 * state in place.
 */
export interface BattleEffectsHook {
  applyEffects(state: BattleState, rng: RngProvider): void;
}
