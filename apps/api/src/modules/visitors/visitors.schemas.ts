import { z } from 'zod';
import { MAX_TTL_SECONDS } from '../credentials/credentials.schemas';

export const registerVisitorSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(200),
  phone: z
    .string()
    .trim()
    .regex(/^\d{10}$/, 'Phone number must be exactly 10 digits'),
  purpose: z.string().trim().min(1, 'Purpose is required').max(500),
  email: z.string().trim().email().optional(),
  ttlSeconds: z.number().int().positive().max(MAX_TTL_SECONDS).optional()
});

export const listVisitorsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export type RegisterVisitorInput = z.infer<typeof registerVisitorSchema>;
