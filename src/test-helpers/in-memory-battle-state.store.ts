import type { BattleState } from '../db/types/index.js';
import type { BattleStateStore } from '../battles/store/battle-state.store.js';

/** in-process stand-in; copies on the way in and out like a real store */
export class InMemoryBattleStateStore implements BattleStateStore {
  private state: BattleState | null = null;
  saves = 0;
  failNextSave: Error | null = null;

  async load(): Promise<BattleState | null> {
    return this.state ? structuredClone(this.state) : null;
  }

  async save(state: BattleState): Promise<void> {
    if (this.failNextSave) {
      const err = this.failNextSave;
      this.failNextSave = null;
      throw err;
    }
    this.saves++;
    this.state = structuredClone(state);
  }

  async hasActiveBattle(): Promise<boolean> {
    return this.state?.isActive === true;
  }

  async clear(): Promise<void> {
    this.state = null;
  }

  /** direct read without going through load() */
  peek(): BattleState | null {
    return this.state;
  }
}
