// Fixed phase cycle; BATTLE_END is absorbing

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { BattlePhase, BattleState } from '../../db/types/index.js';
import { SYSTEM_ACTOR_ID } from '../../db/types/index.js';
import type { RngProvider } from '../rng/rng.service.js';
import { BattleLogService } from '../log/battle-log.service.js';
import { BATTLE_EFFECTS_HOOK, type BattleEffectsHook } from './battle-effects.hook.js';

export const NEXT_PHASE: Record<BattlePhase, BattlePhase> = {
  INITIALIZE: 'SELECT_ACTION',
  SELECT_ACTION: 'RESOLVE_ACTIONS',
  RESOLVE_ACTIONS: 'APPLY_EFFECTS',
  APPLY_EFFECTS: 'CHECK_VICTORY',
  CHECK_VICTORY: 'END_TURN',
  END_TURN: 'SELECT_ACTION',
  BATTLE_END: 'BATTLE_END',
};

export interface PhaseAdvance {
  previousPhase: BattlePhase;
  currentPhase: BattlePhase;
  currentTurn: number;
}

@Injectable()
export class PhaseService {
  private readonly logger = new Logger(PhaseService.name);

  constructor(
    private readonly battleLog: BattleLogService,
    @Optional()
    @Inject(BATTLE_EFFECTS_HOOK)
    private readonly effectsHook?: BattleEffectsHook,
  ) {}

  /**
   * One step of the cycle. Entering SELECT_ACTION starts a new turn:
   * currentTurn + 1 and every hasActed cleared. Always logs.
   */
  advance(state: BattleState, rng: RngProvider, now: Date = new Date()): PhaseAdvance {
    const previousPhase = state.currentPhase;
    const next = NEXT_PHASE[previousPhase];
    state.currentPhase = next;

    if (next === 'SELECT_ACTION') {
      state.currentTurn += 1;
      for (const p of state.participants) p.hasActed = false;
    }
    if (next === 'APPLY_EFFECTS' && this.effectsHook) {
      this.effectsHook.applyEffects(state, rng);
      this.settleVigor(state, now);
    }

    this.battleLog.append(
      state,
      {
        actorId: SYSTEM_ACTOR_ID,
        action: 'Phase Advanced',
        result: `${previousPhase} -> ${next}`,
      },
      now,
    );
    this.logger.debug(`Phase ${previousPhase} -> ${next} (turn ${state.currentTurn})`);

    return { previousPhase, currentPhase: next, currentTurn: state.currentTurn };
  }

  /**
   * Re-establishes the vigor invariants after the effects hook: vigor is
   * clamped into [0, maxVigor] and a creature at 0 becomes defeated.
   */
  private settleVigor(state: BattleState, now: Date): void {
    for (const p of state.participants) {
      const c = p.combatant;
      if (c.type !== 'creature') continue;
      c.currentVigor = Math.max(0, Math.min(c.currentVigor, c.maxVigor));
      if (c.currentVigor === 0 && !p.isDefeated) {
        p.isDefeated = true;
        this.battleLog.append(
          state,
          {
            actorId: SYSTEM_ACTOR_ID,
            action: 'Participant Defeated',
            targetIds: [p.id],
            result: `${p.name} was defeated`,
          },
          now,
        );
      }
    }
  }

  /** jumps to BATTLE_END from any phase and deactivates the battle */
  end(state: BattleState, reason: string, now: Date = new Date()): void {
    state.currentPhase = 'BATTLE_END';
    state.isActive = false;
    this.battleLog.append(
      state,
      { actorId: SYSTEM_ACTOR_ID, action: 'Battle Ended', result: reason },
      now,
    );
  }
}
