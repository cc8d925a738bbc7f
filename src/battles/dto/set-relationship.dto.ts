import { z } from 'zod';
import { RELATIONSHIP } from '../../db/types/index.js';

export const SetRelationshipSchema = z.object({
  participantId: z.string().min(1),
  otherId: z.string().min(1),
  relationship: z.enum(RELATIONSHIP),
});
