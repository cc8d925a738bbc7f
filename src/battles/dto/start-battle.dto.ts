import { z } from 'zod';
import { BATTLE_KIND, VICTORY_TYPE } from '../../db/types/index.js';
import { ParticipantSchema, PositionSchema } from './participant.dto.js';

export const WeatherSchema = z.object({
  name: z.string().min(1).max(40),
  duration: z.number().int().min(1).optional(),
});

export const VictoryConditionSchema = z.object({
  type: z.enum(VICTORY_TYPE),
  faction: z.string().min(1).optional(),
  parameters: z.record(z.string(), z.unknown()).default({}),
  description: z.string().default(''),
});

export const HazardSchema = z.object({
  position: PositionSchema,
  effect: z.string().min(1),
});

export const StartBattleSchema = z
  .object({
    kind: z.enum(BATTLE_KIND),
    participants: z.array(ParticipantSchema).min(1, 'at least one participant is required'),
    battlefieldName: z.string().min(1).max(80).default('Standard Field'),
    weather: z
      .union([z.string().min(1).max(40), WeatherSchema])
      .default('Clear')
      .transform((w) => (typeof w === 'string' ? { name: w } : w)),
    hazards: z.array(HazardSchema).default([]),
    victoryConditions: z.array(VictoryConditionSchema).optional(),
    /** overrides the configured or random seed */
    seed: z.string().min(1).optional(),
  })
  .refine((b) => new Set(b.participants.map((p) => p.id)).size === b.participants.length, {
    message: 'participant ids must be unique',
    path: ['participants'],
  });

export type StartBattleInput = z.input<typeof StartBattleSchema>;
