import { z } from 'zod';

export const MAX_TTL_SECONDS = 30 * 24 * 60 * 60;

export const issueCredentialSchema = z.object({
  subject: z.string().trim().min(1, 'Subject is required').max(200),
  ttlSeconds: z.number().int().positive().max(MAX_TTL_SECONDS).optional()
});

export const listCredentialsQuerySchema = z.object({
  status: z.enum(['UNUSED', 'CONSUMED', 'REVOKED']).optional(),
  includeArchived: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export type IssueCredentialInput = z.infer<typeof issueCredentialSchema>;
export type ListCredentialsQuery = z.infer<typeof listCredentialsQuerySchema>;
