import { z } from 'zod';
import {
  CREATURE_KINDS,
  CREATURE_TYPE,
  PARTICIPANT_KIND,
  RELATIONSHIP,
  STAT_NAME,
  STATUS_CATEGORY,
  STATUS_SEVERITY,
} from '../../db/types/index.js';

const Level = z.number().int().min(0).max(100);
const Modifier = z.number().int().min(-100).max(100);

export const StatBlockSchema = z.object({
  power: Level,
  speed: Level,
  mind: Level,
  charm: Level,
  defense: Level,
  spirit: Level,
});

export const StatusEffectSchema = z.object({
  name: z.string().trim().min(1).max(60),
  category: z.enum(STATUS_CATEGORY),
  duration: z.number().int().min(0).nullable().default(null),
  severity: z.enum(STATUS_SEVERITY).default('MODERATE'),
});

export type StatusEffectInput = z.input<typeof StatusEffectSchema>;

const CreatureTypes = z.union([
  z.tuple([z.enum(CREATURE_TYPE)]),
  z.tuple([z.enum(CREATURE_TYPE), z.enum(CREATURE_TYPE)]),
]);

export const CreatureCombatantSchema = z
  .object({
    type: z.literal('creature'),
    species: z.string().min(1).max(60),
    types: CreatureTypes,
    stats: StatBlockSchema,
    currentVigor: z.number().int().min(0),
    maxVigor: z.number().int().min(1),
    statusEffects: z.array(StatusEffectSchema).default([]),
    statModifiers: z.record(z.enum(STAT_NAME), Modifier).default({}),
    usedMoves: z.array(z.string()).default([]),
    lastAction: z.string().optional(),
  })
  .refine((c) => c.currentVigor <= c.maxVigor, {
    message: 'currentVigor must not exceed maxVigor',
    path: ['currentVigor'],
  })
  .refine(
    (c) => new Set(c.statusEffects.map((e) => e.name.toLowerCase())).size === c.statusEffects.length,
    { message: 'status effect names must be unique', path: ['statusEffects'] },
  );

export type CreatureCombatantInput = z.input<typeof CreatureCombatantSchema>;

export const HandlerCombatantSchema = z.object({
  type: z.literal('handler'),
  name: z.string().min(1).max(60),
  stats: StatBlockSchema,
  conditions: z.array(StatusEffectSchema).default([]),
  canEscape: z.boolean().default(true),
  remainingTeam: z.array(z.string()).default([]),
});

export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const ParticipantSchema = z
  .object({
    id: z.string().trim().min(1).max(80),
    name: z.string().min(1).max(60),
    kind: z.enum(PARTICIPANT_KIND),
    faction: z.string().trim().min(1).max(40),
    position: PositionSchema.default({ x: 0, y: 0 }),
    initiative: z.number().int().default(0),
    hasActed: z.boolean().default(false),
    isDefeated: z.boolean().default(false),
    relationships: z.record(z.string(), z.enum(RELATIONSHIP)).default({}),
    combatant: z.union([CreatureCombatantSchema, HandlerCombatantSchema]),
  })
  .refine((p) => CREATURE_KINDS.includes(p.kind) === (p.combatant.type === 'creature'), {
    message: 'kind must match the combatant payload',
    path: ['kind'],
  })
  .transform((p) => ({
    ...p,
    // vigor 0 always means defeated
    isDefeated: p.isDefeated || (p.combatant.type === 'creature' && p.combatant.currentVigor === 0),
  }));

export type ParticipantInput = z.input<typeof ParticipantSchema>;
