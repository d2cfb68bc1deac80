import { z } from 'zod';

export const listAttemptsQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
  before: z.coerce.number().int().positive().optional(),
  credentialId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50)
});

export type ListAttemptsQuery = z.infer<typeof listAttemptsQuerySchema>;
