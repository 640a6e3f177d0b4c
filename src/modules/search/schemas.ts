import { z } from 'zod';

import { MATCH_METHODS } from './matcher';

export const searchBodySchema = z.object({
  keywords: z.union([z.string(), z.array(z.string())]),
  method: z.enum(MATCH_METHODS).optional(),
  threshold: z.number().int().min(0).max(100).optional(),
  onlyMatched: z.boolean().default(false),
  orderBy: z.enum(['input', 'matchCount', 'formName']).default('input'),
});

export const lastSearchQuerySchema = z.object({
  onlyMatched: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  orderBy: z.enum(['input', 'matchCount', 'formName']).default('input'),
});

export type SearchBody = z.infer<typeof searchBodySchema>;
