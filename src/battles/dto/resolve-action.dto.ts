import { z } from 'zod';
import { ACTION_KIND, CREATURE_TYPE } from '../../db/types/index.js';

export const MoveInputSchema = z.object({
  moveName: z.string().trim().min(1).max(60),
  moveType: z.enum(CREATURE_TYPE).optional(),
  numDamageDice: z.number().int().min(1).max(20).optional(),
  isSpecialMove: z.boolean().optional(),
});

export const ResolveActionSchema = z.object({
  actorId: z.string().min(1),
  kind: z.enum(ACTION_KIND),
  targetIds: z.array(z.string().min(1)).default([]),
  move: MoveInputSchema.optional(),
});

export type ResolveActionInput = z.input<typeof ResolveActionSchema>;

export type MoveInput = z.infer<typeof MoveInputSchema>;
