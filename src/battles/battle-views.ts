import type {
  BattleKind,
  BattleLogEntry,
  BattlePhase,
  CreatureType,
  ParticipantKind,
  Position,
  Relationship,
} from '../db/types/index.js';

export interface VigorUpdate {
  participantId: string;
  oldVigor: number;
  newVigor: number;
  change: number;
  isDefeated: boolean;
  reason: string;
}

export interface StatusEffectApplied {
  targetId: string;
  effectName: string;
  replaced: boolean;
}

export interface ParticipantStatus {
  id: string;
  name: string;
  kind: ParticipantKind;
  faction: string;
  position: Position;
  initiative: number;
  hasActed: boolean;
  isDefeated: boolean;
  creature: {
    species: string;
    types: CreatureType[];
    currentVigor: number;
    maxVigor: number;
    vigorPercentage: number;
    statusEffects: number;
    usedMoves: string[];
    lastAction?: string;
  } | null;
  handler: {
    name: string;
    canEscape: boolean;
    remainingTeam: number;
    conditions: number;
  } | null;
  relationships: Record<string, Relationship>;
}

export interface TurnOrderView {
  currentTurn: number;
  currentPhase: BattlePhase;
  currentActorId: string | null;
  /** first id in turn order that has not acted and is not defeated */
  nextActorId: string | null;
  turnOrder: string[];
  participants: Array<{
    id: string;
    name: string;
    initiative: number;
    hasActed: boolean;
    isDefeated: boolean;
  }>;
}

export interface BattlefieldSummary {
  kind: BattleKind;
  turn: number;
  phase: BattlePhase;
  currentActorId: string | null;
  totalParticipants: number;
  activeParticipants: number;
  defeatedParticipants: number;
  factions: string[];
  weather: string;
  battlefield: string;
  hazards: number;
  recentEvents: Array<Pick<BattleLogEntry, 'turn' | 'actorId' | 'action' | 'result'>>;
}
