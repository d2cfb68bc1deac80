import { z } from 'zod';

export const scanSubmissionSchema = z
  .object({
    payload: z.string().min(1, 'Payload is required').max(4096).optional(),
    image: z.string().min(1, 'Image is required').optional()
  })
  .refine((v) => (v.payload === undefined) !== (v.image === undefined), {
    message: 'Send exactly one of payload or image'
  });

export type ScanSubmissionInput = z.infer<typeof scanSubmissionSchema>;
