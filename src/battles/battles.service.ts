// Public battle operations: load → validate → mutate → persist → narrate

import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type {
  ActionResult,
  BattleLogEntry,
  BattleState,
  MoveMeta,
  Participant,
  Relationship,
} from '../db/types/index.js';
import { SYSTEM_ACTOR_ID } from '../db/types/index.js';
import { StateConflictError, ValidationError } from '../common/errors/game-errors.js';
import { parseInput } from '../common/validation/parse-input.js';
import { EngineConfigService } from '../config/engine-config.service.js';
import { MOVE_CATALOG, type MoveCatalog } from '../content/move-catalog.service.js';
import { RngService, type Rng } from '../engine/rng/rng.service.js';
import { InitiativeService } from '../engine/initiative/initiative.service.js';
import { ActionResolverService } from '../engine/combat/action-resolver.service.js';
import { PhaseService, type PhaseAdvance } from '../engine/phase/phase.service.js';
import { VictoryService, type VictoryEvaluation } from '../engine/victory/victory.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { BattleLogService } from '../engine/log/battle-log.service.js';
import { RosterService } from '../engine/roster/roster.service.js';
import { BATTLE_STATE_STORE, type BattleStateStore } from './store/battle-state.store.js';
import { NARRATION_SINK, type NarrationSink } from './narration.sink.js';
import { ParticipantFactory } from './participant.factory.js';
import {
  ParticipantSchema,
  StatusEffectSchema,
  type ParticipantInput,
  type StatusEffectInput,
} from './dto/participant.dto.js';
import { StartBattleSchema, type StartBattleInput } from './dto/start-battle.dto.js';
import { ResolveActionSchema, type MoveInput, type ResolveActionInput } from './dto/resolve-action.dto.js';
import { UpdateVigorSchema } from './dto/update-vigor.dto.js';
import { SetRelationshipSchema } from './dto/set-relationship.dto.js';
import { GetLogQuerySchema, type GetLogQuery } from './dto/get-log.dto.js';
import type {
  CreateCreatureParticipantInput,
  CreateHandlerParticipantInput,
} from './dto/create-participant.dto.js';
import type {
  BattlefieldSummary,
  ParticipantStatus,
  StatusEffectApplied,
  TurnOrderView,
  VigorUpdate,
} from './battle-views.js';

@Injectable()
export class BattlesService {
  private readonly logger = new Logger(BattlesService.name);

  constructor(
    @Inject(BATTLE_STATE_STORE) private readonly store: BattleStateStore,
    private readonly config: EngineConfigService,
    private readonly rngService: RngService,
    private readonly initiative: InitiativeService,
    private readonly resolver: ActionResolverService,
    private readonly phase: PhaseService,
    private readonly victory: VictoryService,
    private readonly status: StatusService,
    private readonly battleLog: BattleLogService,
    private readonly roster: RosterService,
    private readonly participants: ParticipantFactory,
    @Optional() @Inject(MOVE_CATALOG) private readonly moveCatalog?: MoveCatalog,
    @Optional() @Inject(NARRATION_SINK) private readonly narration?: NarrationSink,
  ) {}

  // --- lifecycle ---

  async startBattle(raw: StartBattleInput): Promise<BattleState> {
    if (await this.store.hasActiveBattle()) {
      this.logger.warn('startBattle rejected: a battle is already active');
      throw new StateConflictError('BATTLE_ALREADY_ACTIVE', 'A battle is already active');
    }
    const input = parseInput(StartBattleSchema, raw, 'Invalid battle setup');
    const victoryConditions = input.victoryConditions ?? this.victory.defaultConditions(input.kind);
    for (const condition of victoryConditions) this.victory.validate(condition);

    const seed = input.seed ?? this.config.get().rngSeed ?? randomUUID();
    const now = new Date();
    const state: BattleState = {
      version: 'battle_state_v1',
      isActive: true,
      kind: input.kind,
      currentTurn: 1,
      currentPhase: 'INITIALIZE',
      participants: input.participants,
      turnOrder: [],
      currentActorId: null,
      battlefield: { name: input.battlefieldName, hazards: input.hazards },
      weather: input.weather,
      victoryConditions,
      log: [],
      rng: { seed, cursor: 0 },
      startedAt: now.toISOString(),
    };

    this.roster.initRelationships(state);
    this.initiative.recompute(state, this.rngService.forInitiative(seed));
    this.battleLog.append(
      state,
      {
        actorId: SYSTEM_ACTOR_ID,
        action: 'Battle Started',
        result: `Battle began: ${input.kind} on ${input.battlefieldName}`,
      },
      now,
    );

    await this.commit(state, 0);
    this.logger.log(
      `Battle started: ${input.kind}, ${state.participants.length} participants, order [${state.turnOrder.join(', ')}]`,
    );
    return structuredClone(state);
  }

  /** final state is returned, then the store is cleared */
  async endBattle(reason = 'Battle concluded'): Promise<BattleState> {
    const state = await this.loadActive('endBattle');
    const logIndex = state.log.length;
    this.phase.end(state, reason);
    await this.store.clear();
    this.logger.log(`Battle ended: ${reason}`);
    await this.narrate(state, logIndex, []);
    return state;
  }

  // --- roster ---

  async addParticipant(raw: ParticipantInput): Promise<Participant> {
    const participant: Participant = parseInput(ParticipantSchema, raw, 'Invalid participant');
    const state = await this.loadActive('addParticipant');
    const logIndex = state.log.length;

    this.roster.add(state, participant);
    this.initiative.recompute(state, this.rngService.forInitiative(state.rng.seed));
    this.battleLog.append(state, {
      actorId: SYSTEM_ACTOR_ID,
      action: 'Participant Added',
      targetIds: [participant.id],
      result: `${participant.name} joined the battle`,
    });

    await this.commit(state, logIndex);
    this.logger.log(`Participant added: ${participant.id}`);
    return structuredClone(participant);
  }

  async removeParticipant(participantId: string): Promise<{ removed: Participant; turnOrder: string[] }> {
    const state = await this.loadActive('removeParticipant');
    const logIndex = state.log.length;

    const removed = this.roster.remove(state, participantId);
    this.initiative.recompute(state, this.rngService.forInitiative(state.rng.seed));
    this.battleLog.append(state, {
      actorId: SYSTEM_ACTOR_ID,
      action: 'Participant Removed',
      targetIds: [removed.id],
      result: `${removed.name} left the battle`,
    });

    await this.commit(state, logIndex);
    this.logger.log(`Participant removed: ${removed.id}`);
    return { removed, turnOrder: [...state.turnOrder] };
  }

  async setRelationship(participantId: string, otherId: string, relationship: Relationship): Promise<void> {
    const input = parseInput(SetRelationshipSchema, { participantId, otherId, relationship });
    const state = await this.loadActive('setRelationship');
    const logIndex = state.log.length;

    this.roster.setRelationship(state, input.participantId, input.otherId, input.relationship);
    this.battleLog.append(state, {
      actorId: input.participantId,
      action: 'Relationship Changed',
      targetIds: [input.otherId],
      result: `${input.participantId} now regards ${input.otherId} as ${input.relationship}`,
    });
    await this.commit(state, logIndex);
  }

  createCreatureParticipant(input: CreateCreatureParticipantInput): Participant {
    return this.participants.createCreature(input);
  }

  createHandlerParticipant(input: CreateHandlerParticipantInput): Participant {
    return this.participants.createHandler(input);
  }

  // --- vigor & status ---

  /** clamps into [0, maxVigor]; defeat is one-way */
  async updateVigor(participantId: string, newVigor: number, reason = ''): Promise<VigorUpdate> {
    const input = parseInput(UpdateVigorSchema, { participantId, newVigor, reason });
    const state = await this.loadActive('updateVigor');
    const logIndex = state.log.length;

    const participant = this.roster.require(state, input.participantId);
    const combatant = participant.combatant;
    if (combatant.type !== 'creature') {
      throw new ValidationError(`${participant.name} has no vigor`, { participantId: participant.id });
    }

    const oldVigor = combatant.currentVigor;
    combatant.currentVigor = Math.max(0, Math.min(input.newVigor, combatant.maxVigor));
    const suffix = input.reason ? ` (${input.reason})` : '';
    this.battleLog.append(state, {
      actorId: SYSTEM_ACTOR_ID,
      action: 'Vigor Updated',
      targetIds: [participant.id],
      result: `${participant.name} vigor ${oldVigor} -> ${combatant.currentVigor}${suffix}`,
    });
    if (combatant.currentVigor === 0 && !participant.isDefeated) {
      participant.isDefeated = true;
      this.battleLog.append(state, {
        actorId: SYSTEM_ACTOR_ID,
        action: 'Participant Defeated',
        targetIds: [participant.id],
        result: `${participant.name} was defeated`,
      });
    }

    await this.commit(state, logIndex);
    return {
      participantId: participant.id,
      oldVigor,
      newVigor: combatant.currentVigor,
      change: combatant.currentVigor - oldVigor,
      isDefeated: participant.isDefeated,
      reason: input.reason,
    };
  }

  async applyStatusEffect(targetId: string, raw: StatusEffectInput): Promise<StatusEffectApplied> {
    const effect = parseInput(StatusEffectSchema, raw, 'Invalid status effect');
    const state = await this.loadActive('applyStatusEffect');
    const logIndex = state.log.length;

    const target = this.roster.require(state, targetId);
    const { replaced } = this.status.apply(target.combatant, effect);
    this.battleLog.append(state, {
      actorId: SYSTEM_ACTOR_ID,
      action: 'Status Effect Applied',
      targetIds: [target.id],
      result: `${target.name} is now ${effect.name}`,
    });

    await this.commit(state, logIndex);
    return { targetId: target.id, effectName: effect.name, replaced };
  }

  async removeStatusEffect(targetId: string, effectName: string): Promise<{ removed: boolean }> {
    const state = await this.loadActive('removeStatusEffect');
    const logIndex = state.log.length;

    const target = this.roster.require(state, targetId);
    const removed = this.status.remove(target.combatant, effectName);
    if (!removed) return { removed };

    this.battleLog.append(state, {
      actorId: SYSTEM_ACTOR_ID,
      action: 'Status Effect Removed',
      targetIds: [target.id],
      result: `${target.name} is no longer ${effectName}`,
    });
    await this.commit(state, logIndex);
    return { removed };
  }

  // --- turn flow ---

  async resolveAction(raw: ResolveActionInput): Promise<ActionResult[]> {
    const input = parseInput(ResolveActionSchema, raw, 'Invalid action');
    const state = await this.loadActive('resolveAction');
    const logIndex = state.log.length;

    const move = input.kind === 'ATTACK' ? this.completeMove(input.move) : undefined;
    const rng = this.actionRng(state);
    const results = this.resolver.resolve(
      state,
      { actorId: input.actorId, kind: input.kind, targetIds: input.targetIds, move },
      rng,
    );
    state.rng.cursor = rng.cursor;

    await this.commit(state, logIndex, results);
    this.logger.debug(`${input.actorId} ${input.kind}: ${results.map((r) => r.status).join(', ')}`);
    return results;
  }

  async advancePhase(): Promise<PhaseAdvance> {
    const state = await this.loadActive('advancePhase');
    const logIndex = state.log.length;

    const rng = this.actionRng(state);
    const result = this.phase.advance(state, rng);
    state.rng.cursor = rng.cursor;

    await this.commit(state, logIndex);
    return result;
  }

  async evaluateVictory(now: Date = new Date()): Promise<VictoryEvaluation> {
    const state = await this.loadCurrent();
    return this.victory.evaluate(state, now);
  }

  // --- queries ---

  async getLog(query: GetLogQuery = {}): Promise<BattleLogEntry[]> {
    const input = parseInput(GetLogQuerySchema, query, 'Invalid log query');
    const state = await this.loadCurrent();
    return this.battleLog.query(state.log, input);
  }

  async getBattleState(): Promise<BattleState> {
    return this.loadCurrent();
  }

  async getParticipantStatus(participantId: string): Promise<ParticipantStatus> {
    const state = await this.loadCurrent();
    const p = this.roster.require(state, participantId);
    const c = p.combatant;

    return {
      id: p.id,
      name: p.name,
      kind: p.kind,
      faction: p.faction,
      position: p.position,
      initiative: p.initiative,
      hasActed: p.hasActed,
      isDefeated: p.isDefeated,
      creature:
        c.type === 'creature'
          ? {
              species: c.species,
              types: [...c.types],
              currentVigor: c.currentVigor,
              maxVigor: c.maxVigor,
              vigorPercentage: Math.floor((c.currentVigor * 100) / Math.max(1, c.maxVigor)),
              statusEffects: c.statusEffects.length,
              usedMoves: c.usedMoves,
              lastAction: c.lastAction,
            }
          : null,
      handler:
        c.type === 'handler'
          ? {
              name: c.name,
              canEscape: c.canEscape,
              remainingTeam: c.remainingTeam.length,
              conditions: c.conditions.length,
            }
          : null,
      relationships: p.relationships,
    };
  }

  async getTurnOrder(): Promise<TurnOrderView> {
    const state = await this.loadCurrent();
    const byId = new Map(state.participants.map((p) => [p.id, p]));
    const nextActorId =
      state.turnOrder.find((id) => {
        const p = byId.get(id);
        return p !== undefined && !p.hasActed && !p.isDefeated;
      }) ?? null;

    return {
      currentTurn: state.currentTurn,
      currentPhase: state.currentPhase,
      currentActorId: state.currentActorId,
      nextActorId,
      turnOrder: state.turnOrder,
      participants: [...state.participants]
        .sort((a, b) => b.initiative - a.initiative)
        .map((p) => ({
          id: p.id,
          name: p.name,
          initiative: p.initiative,
          hasActed: p.hasActed,
          isDefeated: p.isDefeated,
        })),
    };
  }

  async getBattlefieldSummary(): Promise<BattlefieldSummary> {
    const state = await this.loadCurrent();
    const defeated = state.participants.filter((p) => p.isDefeated).length;

    return {
      kind: state.kind,
      turn: state.currentTurn,
      phase: state.currentPhase,
      currentActorId: state.currentActorId,
      totalParticipants: state.participants.length,
      activeParticipants: state.participants.length - defeated,
      defeatedParticipants: defeated,
      factions: [...new Set(state.participants.map((p) => p.faction))],
      weather: state.weather.name,
      battlefield: state.battlefield.name,
      hazards: state.battlefield.hazards.length,
      recentEvents: state.log.slice(-3).map((e) => ({
        turn: e.turn,
        actorId: e.actorId,
        action: e.action,
        result: e.result,
      })),
    };
  }

  // --- internals ---

  private async loadCurrent(): Promise<BattleState> {
    const state = await this.store.load();
    if (!state) {
      throw new StateConflictError('NO_ACTIVE_BATTLE', 'No active battle');
    }
    return state;
  }

  private async loadActive(operation: string): Promise<BattleState> {
    const state = await this.store.load();
    if (!state || !state.isActive) {
      this.logger.warn(`${operation} rejected: no active battle`);
      throw new StateConflictError('NO_ACTIVE_BATTLE', 'No active battle');
    }
    return state;
  }

  private actionRng(state: BattleState): Rng {
    return this.rngService.create(state.rng.seed, state.rng.cursor);
  }

  /** call-supplied fields win; the catalog fills the rest */
  private completeMove(move: MoveInput | undefined): MoveMeta {
    if (!move) {
      throw new ValidationError('Attack requires a move');
    }
    const known = this.moveCatalog?.findMove(move.moveName);
    const moveType = move.moveType ?? known?.moveType;
    const numDamageDice = move.numDamageDice ?? known?.numDamageDice;
    const isSpecialMove = move.isSpecialMove ?? known?.isSpecialMove;
    if (moveType === undefined || numDamageDice === undefined || isSpecialMove === undefined) {
      throw new ValidationError(`No metadata for move: ${move.moveName}`, {
        moveName: move.moveName,
        missing: [
          moveType === undefined ? 'moveType' : null,
          numDamageDice === undefined ? 'numDamageDice' : null,
          isSpecialMove === undefined ? 'isSpecialMove' : null,
        ].filter((f) => f !== null),
      });
    }
    return { moveName: move.moveName, moveType, numDamageDice, isSpecialMove };
  }

  private async commit(state: BattleState, logIndex: number, results: ActionResult[] = []): Promise<void> {
    await this.store.save(state);
    await this.narrate(state, logIndex, results);
  }

  /** after persistence; a failing sink does not undo the operation */
  private async narrate(state: BattleState, logIndex: number, results: ActionResult[]): Promise<void> {
    if (!this.narration) return;
    try {
      await this.narration.publish(this.battleLog.since(state.log, logIndex), results);
    } catch (err) {
      this.logger.error(
        `Narration sink failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
    }
  }
}
