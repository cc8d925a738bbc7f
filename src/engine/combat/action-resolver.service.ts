// Executes one submitted action against the battle state

import { Injectable } from '@nestjs/common';
import type {
  ActionKind,
  ActionResult,
  AttackHit,
  AttackMiss,
  BattleState,
  DeferredAction,
  MoveMeta,
  Participant,
  TargetInvalid,
  TargetNotFound,
} from '../../db/types/index.js';
import { NotFoundError, StateConflictError, ValidationError } from '../../common/errors/game-errors.js';
import type { RngProvider } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import { TypeChartService } from '../type-chart/type-chart.service.js';
import { BattleLogService } from '../log/battle-log.service.js';
import { HitService } from './hit.service.js';
import { DamageService } from './damage.service.js';

export interface ResolvedAction {
  actorId: string;
  kind: ActionKind;
  targetIds: string[];
  /** required for ATTACK, with every field filled in */
  move?: MoveMeta;
}

export interface ResolveOptions {
  now?: Date;
}

const DEFERRED_VERBS: Record<DeferredAction['kind'], string> = {
  SWITCH: 'is switching out',
  ITEM: 'used an item',
  ESCAPE: 'is trying to escape',
};

@Injectable()
export class ActionResolverService {
  constructor(
    private readonly stats: StatsService,
    private readonly typeChart: TypeChartService,
    private readonly hitService: HitService,
    private readonly damageService: DamageService,
    private readonly battleLog: BattleLogService,
  ) {}

  /**
   * Validates the actor and move before touching the state, then
   * resolves every target independently in submission order.
   * Appends exactly one log entry per call.
   * Actor and target ids are matched exactly (case-sensitive).
   */
  resolve(
    state: BattleState,
    action: ResolvedAction,
    rng: RngProvider,
    options: ResolveOptions = {},
  ): ActionResult[] {
    const actor = state.participants.find((p) => p.id === action.actorId);
    if (!actor) {
      throw new NotFoundError(`Actor not found: ${action.actorId}`, { actorId: action.actorId });
    }
    if (actor.isDefeated) {
      throw new StateConflictError('ACTOR_DEFEATED', `${actor.name} is defeated and cannot act`, {
        actorId: actor.id,
      });
    }

    let results: ActionResult[];
    let summary: string;

    if (action.kind === 'ATTACK') {
      const move = this.assertAttack(actor, action);
      results = this.resolveAttack(state, actor, move, action.targetIds, rng);
      summary = [`${actor.name} used ${move.moveName}`, ...results.map((r) => r.message)].join(' | ');
    } else {
      const message = `${actor.name} ${DEFERRED_VERBS[action.kind]}`;
      results = [
        {
          kind: action.kind,
          status: 'DEFERRED',
          actorId: actor.id,
          targetIds: [...action.targetIds],
          message,
        },
      ];
      summary = message;
    }

    actor.hasActed = true;
    this.battleLog.append(
      state,
      { actorId: actor.id, action: action.kind, targetIds: action.targetIds, result: summary },
      options.now,
    );
    return results;
  }

  private assertAttack(actor: Participant, action: ResolvedAction): MoveMeta {
    if (actor.combatant.type !== 'creature') {
      throw new ValidationError('Only creatures can use moves', { actorId: actor.id });
    }
    if (!action.move) {
      throw new ValidationError('Attack requires move metadata', { actorId: actor.id });
    }
    if (!Number.isInteger(action.move.numDamageDice) || action.move.numDamageDice < 1) {
      throw new ValidationError('numDamageDice must be an integer >= 1', {
        numDamageDice: action.move.numDamageDice,
      });
    }
    if (action.targetIds.length === 0) {
      throw new ValidationError('Attack requires at least one target', { actorId: actor.id });
    }
    return action.move;
  }

  private resolveAttack(
    state: BattleState,
    actor: Participant,
    move: MoveMeta,
    targetIds: string[],
    rng: RngProvider,
  ): ActionResult[] {
    if (actor.combatant.type === 'creature') {
      if (!actor.combatant.usedMoves.includes(move.moveName)) {
        actor.combatant.usedMoves.push(move.moveName);
      }
      actor.combatant.lastAction = move.moveName;
    }

    const attackLevel = this.stats.attackLevel(actor.combatant, move.isSpecialMove);
    return targetIds.map((targetId) => {
      const target = state.participants.find((p) => p.id === targetId);
      if (!target) {
        const notFound: TargetNotFound = {
          kind: 'ATTACK',
          status: 'NOT_FOUND',
          targetId,
          message: `Target not found: ${targetId}`,
        };
        return notFound;
      }
      return this.attackTarget(actor, target, move, attackLevel, rng);
    });
  }

  private attackTarget(
    actor: Participant,
    target: Participant,
    move: MoveMeta,
    attackLevel: number,
    rng: RngProvider,
  ): AttackHit | AttackMiss | TargetInvalid {
    const defender = target.combatant;
    if (defender.type !== 'creature') {
      return {
        kind: 'ATTACK',
        status: 'INVALID_TARGET',
        targetId: target.id,
        message: `${target.name} cannot be targeted by moves`,
      };
    }

    const defenseValue = this.stats.defenseValue(defender, move.isSpecialMove);
    const hit = this.hitService.rollHit(attackLevel, defenseValue, rng);
    if (!hit.hit) {
      return {
        kind: 'ATTACK',
        status: 'MISS',
        targetId: target.id,
        roll: hit.roll,
        attackTotal: hit.attackTotal,
        defenseValue,
        message: `${actor.name}'s ${move.moveName} missed ${target.name}`,
      };
    }

    const [type1, type2] = defender.types;
    const effectiveness = this.typeChart.effectiveness(move.moveType, type1, type2);
    const effectivenessLabel = this.typeChart.describe(effectiveness);
    const damage = this.damageService.rollDamage(
      {
        numDamageDice: move.numDamageDice,
        attackLevel,
        isCritical: hit.isCritical,
        multiplier: effectiveness,
      },
      rng,
    );

    const vigorBefore = defender.currentVigor;
    const vigorAfter = Math.max(0, vigorBefore - damage.damage);
    defender.currentVigor = vigorAfter;

    const defeated = vigorAfter === 0 && !target.isDefeated;
    if (defeated) target.isDefeated = true;

    let message = `${actor.name} used ${move.moveName} on ${target.name} for ${damage.damage} damage`;
    if (hit.isCritical) message += ' (critical hit)';
    if (effectiveness !== 1) message += ` - ${effectivenessLabel}`;
    if (defeated) message += ' - Target defeated!';

    return {
      kind: 'ATTACK',
      status: 'HIT',
      targetId: target.id,
      roll: hit.roll,
      attackTotal: hit.attackTotal,
      defenseValue,
      isCritical: hit.isCritical,
      diceRolls: damage.diceRolls,
      baseDamage: damage.baseDamage,
      effectiveness,
      effectivenessLabel,
      damage: damage.damage,
      vigorBefore,
      vigorAfter,
      defeated,
      message,
    };
  }
}
