import { z } from 'zod';

export const scanOnceSchema = z.object({
  timeoutSeconds: z.number().int().min(1).max(120).default(30)
});
