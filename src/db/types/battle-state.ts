// Persisted battle state: one document per encounter

import type {
  ActionKind,
  BattleKind,
  BattlePhase,
  CreatureType,
  ParticipantKind,
  Relationship,
  StatName,
  StatusCategory,
  StatusSeverity,
  VictoryType,
} from './enums.js';

export type StatBlock = Record<StatName, number>;

export type StatusEffect = {
  name: string;
  category: StatusCategory;
  /** remaining turns; null = indefinite */
  duration: number | null;
  severity: StatusSeverity;
};

export type CreatureCombatant = {
  type: 'creature';
  species: string;
  types: [CreatureType] | [CreatureType, CreatureType];
  stats: StatBlock;
  currentVigor: number;
  maxVigor: number;
  statusEffects: StatusEffect[];
  statModifiers: Partial<StatBlock>;
  usedMoves: string[];
  lastAction?: string;
};

export type HandlerCombatant = {
  type: 'handler';
  name: string;
  stats: StatBlock;
  conditions: StatusEffect[];
  canEscape: boolean;
  /** ids (or names) of team members not yet sent out */
  remainingTeam: string[];
};

export type Combatant = CreatureCombatant | HandlerCombatant;

export type Position = { x: number; y: number };

export type Participant = {
  id: string;
  name: string;
  kind: ParticipantKind;
  faction: string;
  position: Position;
  initiative: number;
  hasActed: boolean;
  isDefeated: boolean;
  relationships: Record<string, Relationship>;
  combatant: Combatant;
};

export type CreatureParticipant = Participant & { combatant: CreatureCombatant };

export type Hazard = {
  position: Position;
  effect: string;
};

export type Battlefield = {
  name: string;
  hazards: Hazard[];
};

export type Weather = {
  name: string;
  duration?: number;
};

export type VictoryCondition = {
  type: VictoryType;
  faction?: string;
  parameters: Record<string, unknown>;
  description: string;
};

export type BattleLogEntry = {
  turn: number;
  phase: BattlePhase;
  actorId: string;
  action: string;
  targetIds: string[];
  result: string;
  timestamp: string;
};

export type BattleState = {
  version: 'battle_state_v1';
  isActive: boolean;
  kind: BattleKind;
  currentTurn: number;
  currentPhase: BattlePhase;
  participants: Participant[];
  turnOrder: string[];
  currentActorId: string | null;
  battlefield: Battlefield;
  weather: Weather;
  victoryConditions: VictoryCondition[];
  log: BattleLogEntry[];
  rng: {
    seed: string;
    cursor: number;
  };
  startedAt: string;
};

// ---- action resolution ----

export type MoveMeta = {
  moveName: string;
  moveType: CreatureType;
  numDamageDice: number;
  isSpecialMove: boolean;
};

export type ActionRequest = {
  actorId: string;
  kind: ActionKind;
  targetIds: string[];
  move?: Partial<MoveMeta> & { moveName: string };
};

export type AttackHit = {
  kind: 'ATTACK';
  status: 'HIT';
  targetId: string;
  roll: number;
  attackTotal: number;
  defenseValue: number;
  isCritical: boolean;
  diceRolls: number[];
  baseDamage: number;
  effectiveness: number;
  effectivenessLabel: string;
  damage: number;
  vigorBefore: number;
  vigorAfter: number;
  defeated: boolean;
  message: string;
};

export type AttackMiss = {
  kind: 'ATTACK';
  status: 'MISS';
  targetId: string;
  roll: number;
  attackTotal: number;
  defenseValue: number;
  message: string;
};

export type TargetNotFound = {
  kind: 'ATTACK';
  status: 'NOT_FOUND';
  targetId: string;
  message: string;
};

/** target exists but carries no vigor (a handler) */
export type TargetInvalid = {
  kind: 'ATTACK';
  status: 'INVALID_TARGET';
  targetId: string;
  message: string;
};

/** Switch/Item/Escape: mechanics belong to ruleset collaborators */
export type DeferredAction = {
  kind: Exclude<ActionKind, 'ATTACK'>;
  status: 'DEFERRED';
  actorId: string;
  targetIds: string[];
  message: string;
};

export type ActionResult = AttackHit | AttackMiss | TargetNotFound | TargetInvalid | DeferredAction;
