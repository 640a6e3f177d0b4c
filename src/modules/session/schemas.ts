import { z } from 'zod';

// Blank values pass through so the credential checks can name the missing field.
export const createSessionBodySchema = z.object({
  serverUrl: z.string().nullish(),
  apiToken: z.string().nullish(),
});

export type CreateSessionBody = z.infer<typeof createSessionBodySchema>;
