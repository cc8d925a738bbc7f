import { z } from 'zod';

export const GetLogQuerySchema = z.object({
  /** trailing entries; 0 = all */
  count: z.number().int().min(0).default(0),
  actorId: z.string().min(1).optional(),
});

export type GetLogQuery = z.input<typeof GetLogQuerySchema>;
