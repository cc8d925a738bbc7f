import { z } from 'zod';
import { CREATURE_TYPE } from '../../db/types/index.js';
import { PositionSchema, StatBlockSchema } from './participant.dto.js';

export const CreateCreatureParticipantSchema = z.object({
  name: z.string().min(1).max(60),
  species: z.string().min(1).max(60).optional(),
  types: z.union([
    z.tuple([z.enum(CREATURE_TYPE)]),
    z.tuple([z.enum(CREATURE_TYPE), z.enum(CREATURE_TYPE)]),
  ]),
  stats: StatBlockSchema,
  maxVigor: z.number().int().min(1),
  currentVigor: z.number().int().min(0).optional(),
  faction: z.string().trim().min(1).max(40).default('PLAYER'),
  position: PositionSchema.default({ x: 0, y: 0 }),
});

export type CreateCreatureParticipantInput = z.input<typeof CreateCreatureParticipantSchema>;

export const CreateHandlerParticipantSchema = z.object({
  name: z.string().min(1).max(60),
  stats: StatBlockSchema,
  faction: z.string().trim().min(1).max(40).default('ENEMY'),
  remainingTeam: z.array(z.string()).default([]),
  canEscape: z.boolean().default(true),
  position: PositionSchema.default({ x: 0, y: 0 }),
});

export type CreateHandlerParticipantInput = z.input<typeof CreateHandlerParticipantSchema>;
