import { Inject, Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import { DB, type DrizzleDB } from '../../db/drizzle.module.js';
import { battleStates } from '../../db/schema/index.js';
import type { BattleState } from '../../db/types/index.js';
import { EngineConfigService } from '../../config/engine-config.service.js';
import type { BattleStateStore } from './battle-state.store.js';

/** one row per session id, upserted on every save */
@Injectable()
export class DrizzleBattleStateStore implements BattleStateStore {
  constructor(
    @Inject(DB) private readonly db: DrizzleDB,
    private readonly config: EngineConfigService,
  ) {}

  private get sessionId(): string {
    return this.config.get().sessionId;
  }

  async load(): Promise<BattleState | null> {
    const row = await this.db.query.battleStates.findFirst({
      where: eq(battleStates.sessionId, this.sessionId),
    });
    return row?.state ?? null;
  }

  async save(state: BattleState): Promise<void> {
    const now = new Date();
    await this.db
      .insert(battleStates)
      .values({
        sessionId: this.sessionId,
        state,
        isActive: state.isActive,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: battleStates.sessionId,
        set: { state, isActive: state.isActive, updatedAt: now },
      });
  }

  async hasActiveBattle(): Promise<boolean> {
    const row = await this.db.query.battleStates.findFirst({
      where: and(
        eq(battleStates.sessionId, this.sessionId),
        eq(battleStates.isActive, true),
      ),
      columns: { id: true },
    });
    return row !== undefined;
  }

  async clear(): Promise<void> {
    await this.db
      .delete(battleStates)
      .where(eq(battleStates.sessionId, this.sessionId));
  }
}
