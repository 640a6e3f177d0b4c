import { z } from 'zod';

export const formUidParamSchema = z.object({
  uid: z.string().min(1),
});
