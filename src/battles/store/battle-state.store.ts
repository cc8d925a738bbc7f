import type { BattleState } from '../../db/types/index.js';

export const BATTLE_STATE_STORE = Symbol('BATTLE_STATE_STORE');

/**
 * Persistence boundary for the single current battle of a host process.
 * Failures propagate to the caller of the battle operation.
 */
export interface BattleStateStore {
  /** current battle, active or not; null when nothing is stored */
  load(): Promise<BattleState | null>;
  save(state: BattleState): Promise<void>;
  hasActiveBattle(): Promise<boolean>;
  clear(): Promise<void>;
}
