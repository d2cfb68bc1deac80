import { z } from 'zod';

export const createUserSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3)
    .max(64)
    .regex(/^[A-Za-z0-9._-]+$/, 'Username may only contain letters, digits, dot, dash and underscore'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  role: z.enum(['ADMIN', 'RECEPTION']).default('RECEPTION')
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
