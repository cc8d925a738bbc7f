import { z } from 'zod';

export const UpdateVigorSchema = z.object({
  participantId: z.string().min(1),
  newVigor: z.number().int(),
  reason: z.string().max(200).default(''),
});
