import type {
  BattleState,
  CreatureCombatant,
  HandlerCombatant,
  Participant,
  StatBlock,
} from '../db/types/index.js';

export function makeStats(overrides: Partial<StatBlock> = {}): StatBlock {
  return {
    power: 1,
    speed: 1,
    mind: 1,
    charm: 1,
    defense: 1,
    spirit: 1,
    ...overrides,
  };
}

export function makeCreature(overrides: Partial<CreatureCombatant> = {}): CreatureCombatant {
  return {
    type: 'creature',
    species: 'Testling',
    types: ['NORMAL'],
    stats: makeStats(),
    currentVigor: 50,
    maxVigor: 50,
    statusEffects: [],
    statModifiers: {},
    usedMoves: [],
    ...overrides,
  };
}

export function makeHandler(overrides: Partial<HandlerCombatant> = {}): HandlerCombatant {
  return {
    type: 'handler',
    name: 'Test Handler',
    stats: makeStats(),
    conditions: [],
    canEscape: true,
    remainingTeam: [],
    ...overrides,
  };
}

export function makeParticipant(overrides: Partial<Participant> = {}): Participant {
  return {
    id: 'p1',
    name: 'Participant',
    kind: 'PLAYER_CREATURE',
    faction: 'PLAYER',
    position: { x: 0, y: 0 },
    initiative: 0,
    hasActed: false,
    isDefeated: false,
    relationships: {},
    combatant: makeCreature(),
    ...overrides,
  };
}

export function makeBattleState(overrides: Partial<BattleState> = {}): BattleState {
  const participants = overrides.participants ?? [
    makeParticipant({ id: 'ally', name: 'Ally' }),
    makeParticipant({ id: 'foe', name: 'Foe', kind: 'ENEMY_CREATURE', faction: 'ENEMY' }),
  ];
  return {
    version: 'battle_state_v1',
    isActive: true,
    kind: 'WILD',
    currentTurn: 1,
    currentPhase: 'INITIALIZE',
    participants,
    turnOrder: participants.map((p) => p.id),
    currentActorId: participants[0]?.id ?? null,
    battlefield: { name: 'Test Field', hazards: [] },
    weather: { name: 'Clear' },
    victoryConditions: [],
    log: [],
    rng: { seed: 'test-seed', cursor: 0 },
    startedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
