// Victory evaluation: pure scan, any-met over the condition list

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import type {
  BattleKind,
  BattleState,
  Participant,
  ParticipantKind,
  VictoryCondition,
} from '../../db/types/index.js';
import { ENEMY_KINDS } from '../../db/types/index.js';
import { parseInput } from '../../common/validation/parse-input.js';

export const DEFAULT_VICTORY_FACTION = 'PLAYER';

const DefeatSpecificTargetParams = z.object({ targetId: z.string().min(1) });
const SurvivalParams = z.object({ turns: z.number().int().min(1) });
const TimerParams = z.object({
  /** ISO-8601 instant or epoch milliseconds */
  timeLimit: z.union([z.string().datetime({ offset: true }), z.number().int().nonnegative()]),
});

export interface ConditionResult {
  condition: VictoryCondition;
  met: boolean;
  reason: string;
}

export interface VictoryEvaluation {
  met: boolean;
  /** reason of the first met condition, or why none is met */
  reason: string;
  /** first met condition */
  condition?: VictoryCondition;
  results: ConditionResult[];
}

type Side = 'PLAYER' | 'ENEMY';

function sideOf(kind: ParticipantKind): Side {
  return ENEMY_KINDS.includes(kind) ? 'ENEMY' : 'PLAYER';
}

@Injectable()
export class VictoryService {
  defaultConditions(kind: BattleKind): VictoryCondition[] {
    const defeatEnemies: VictoryCondition = {
      type: 'DEFEAT_ALL_ENEMIES',
      faction: 'PLAYER',
      parameters: {},
      description: 'Defeat all opposing creatures',
    };
    switch (kind) {
      case 'WILD':
        return [
          { ...defeatEnemies, description: 'Defeat all wild creatures' },
          { type: 'ESCAPE', faction: 'PLAYER', parameters: {}, description: 'Escape from the battle' },
        ];
      case 'HANDLER':
        return [
          defeatEnemies,
          {
            type: 'DEFEAT_ALL_ENEMIES',
            faction: 'ENEMY',
            parameters: {},
            description: 'Defeat all player creatures',
          },
        ];
      default:
        return [defeatEnemies];
    }
  }

  /** rejects conditions whose parameter bag the evaluator cannot read */
  validate(condition: VictoryCondition): void {
    const label = `Invalid parameters for ${condition.type}`;
    switch (condition.type) {
      case 'DEFEAT_SPECIFIC_TARGET':
        parseInput(DefeatSpecificTargetParams, condition.parameters, label);
        return;
      case 'SURVIVAL':
        parseInput(SurvivalParams, condition.parameters, label);
        return;
      case 'TIMER':
        parseInput(TimerParams, condition.parameters, label);
        return;
      default:
        return;
    }
  }

  evaluate(state: BattleState, now: Date = new Date()): VictoryEvaluation {
    const results = state.victoryConditions.map((condition) =>
      this.evaluateCondition(state, condition, now),
    );
    const first = results.find((r) => r.met);
    if (first) {
      return { met: true, reason: first.reason, condition: first.condition, results };
    }
    return {
      met: false,
      reason: results.length === 0 ? 'No victory conditions' : 'No victory condition met',
      results,
    };
  }

  evaluateCondition(state: BattleState, condition: VictoryCondition, now: Date = new Date()): ConditionResult {
    const done = (met: boolean, reason: string): ConditionResult => ({ condition, met, reason });

    switch (condition.type) {
      case 'DEFEAT_ALL_ENEMIES': {
        const faction = condition.faction ?? DEFAULT_VICTORY_FACTION;
        const opponents = this.opponentsOf(state, faction);
        if (opponents.length === 0) return done(true, `${faction} has no opponents left`);
        const standing = opponents.filter((p) => !p.isDefeated).length;
        return standing === 0
          ? done(true, `${faction} defeated all opponents`)
          : done(false, `${standing} of ${opponents.length} opponents of ${faction} still standing`);
      }

      case 'DEFEAT_SPECIFIC_TARGET': {
        const params = DefeatSpecificTargetParams.safeParse(condition.parameters);
        if (!params.success) return done(false, 'Missing targetId');
        const target = state.participants.find((p) => p.id === params.data.targetId);
        if (!target) return done(false, `Target ${params.data.targetId} is not in the battle`);
        return target.isDefeated
          ? done(true, `${target.name} was defeated`)
          : done(false, `${target.name} is still standing`);
      }

      case 'SURVIVAL': {
        const params = SurvivalParams.safeParse(condition.parameters);
        if (!params.success) return done(false, 'Missing turns');
        return state.currentTurn >= params.data.turns
          ? done(true, `Survived ${params.data.turns} turns`)
          : done(false, `Turn ${state.currentTurn} of ${params.data.turns}`);
      }

      case 'TIMER': {
        const params = TimerParams.safeParse(condition.parameters);
        if (!params.success) return done(false, 'Missing timeLimit');
        const limit = new Date(params.data.timeLimit).getTime();
        return now.getTime() >= limit
          ? done(true, 'Time limit reached')
          : done(false, 'Time limit not reached');
      }

      // needs escape/objective tracking the engine does not keep
      case 'ESCAPE':
      case 'OBJECTIVE':
        return done(false, `${condition.type} is not tracked by the engine`);
    }
  }

  /**
   * Participants outside `faction` on the other side. The faction's side
   * comes from its first member; a faction with no members is treated as
   * the player side.
   */
  private opponentsOf(state: BattleState, faction: string): Participant[] {
    const firstMember = state.participants.find((p) => p.faction === faction);
    const side: Side = firstMember ? sideOf(firstMember.kind) : 'PLAYER';
    return state.participants.filter((p) => p.faction !== faction && sideOf(p.kind) !== side);
  }
}
