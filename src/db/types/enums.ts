// Canonical enums for battle state

export const BATTLE_KIND = ['WILD', 'HANDLER', 'GYM', 'BOSS'] as const;
export type BattleKind = (typeof BATTLE_KIND)[number];

export const BATTLE_PHASE = [
  'INITIALIZE',
  'SELECT_ACTION',
  'RESOLVE_ACTIONS',
  'APPLY_EFFECTS',
  'CHECK_VICTORY',
  'END_TURN',
  'BATTLE_END',
] as const;
export type BattlePhase = (typeof BATTLE_PHASE)[number];

export const PARTICIPANT_KIND = [
  'PLAYER_CREATURE',
  'ENEMY_CREATURE',
  'PLAYER_HANDLER',
  'ENEMY_HANDLER',
] as const;
export type ParticipantKind = (typeof PARTICIPANT_KIND)[number];

export const CREATURE_KINDS: readonly ParticipantKind[] = ['PLAYER_CREATURE', 'ENEMY_CREATURE'];
export const ENEMY_KINDS: readonly ParticipantKind[] = ['ENEMY_CREATURE', 'ENEMY_HANDLER'];

export const RELATIONSHIP = ['HOSTILE', 'ALLIED', 'NEUTRAL'] as const;
export type Relationship = (typeof RELATIONSHIP)[number];

export const VICTORY_TYPE = [
  'DEFEAT_ALL_ENEMIES',
  'DEFEAT_SPECIFIC_TARGET',
  'SURVIVAL',
  'ESCAPE',
  'OBJECTIVE',
  'TIMER',
] as const;
export type VictoryType = (typeof VICTORY_TYPE)[number];

export const ACTION_KIND = ['ATTACK', 'SWITCH', 'ITEM', 'ESCAPE'] as const;
export type ActionKind = (typeof ACTION_KIND)[number];

export const CREATURE_TYPE = [
  'NORMAL',
  'FIRE',
  'WATER',
  'ELECTRIC',
  'GRASS',
  'ICE',
  'FIGHTING',
  'POISON',
  'GROUND',
  'FLYING',
  'PSYCHIC',
  'BUG',
  'ROCK',
  'GHOST',
  'DRAGON',
  'DARK',
  'STEEL',
  'FAIRY',
] as const;
export type CreatureType = (typeof CREATURE_TYPE)[number];

// power: physical attack, speed: initiative, mind: special attack,
// charm: social, defense: physical resistance, spirit: special resistance
export const STAT_NAME = ['power', 'speed', 'mind', 'charm', 'defense', 'spirit'] as const;
export type StatName = (typeof STAT_NAME)[number];

export const STATUS_CATEGORY = ['AILMENT', 'VOLATILE', 'BUFF', 'DEBUFF'] as const;
export type StatusCategory = (typeof STATUS_CATEGORY)[number];

export const STATUS_SEVERITY = ['MILD', 'MODERATE', 'SEVERE'] as const;
export type StatusSeverity = (typeof STATUS_SEVERITY)[number];

export const SYSTEM_ACTOR_ID = 'SYSTEM';
