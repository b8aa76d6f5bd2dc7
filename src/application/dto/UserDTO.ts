import { z } from 'zod';

export const ConsentUpdateSchema = z.object({
  consent: z.boolean({
    required_error: 'consent is required',
    invalid_type_error: 'consent must be true or false',
  }),
});

export type ConsentUpdateDTO = z.infer<typeof ConsentUpdateSchema>;
