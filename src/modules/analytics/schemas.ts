import { z } from 'zod';

export const analyticsOverviewQuerySchema = z.object({
  top: z.coerce.number().int().min(1).max(50).default(10),
});
