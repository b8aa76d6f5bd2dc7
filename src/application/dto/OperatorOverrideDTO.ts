import { z } from 'zod';

export const OverrideRequestSchema = z
  .object({
    userId: z.string().min(1),
    recommendationId: z.string().min(1),
    action: z.enum(['approve', 'flag']),
    reason: z.string().trim().default(''),
    operatorId: z.string().min(1),
  })
  .refine((input) => input.action !== 'flag' || input.reason.length > 0, {
    message: 'A reason is required when flagging a recommendation',
    path: ['reason'],
  });

export type OverrideRequestDTO = z.infer<typeof OverrideRequestSchema>;
