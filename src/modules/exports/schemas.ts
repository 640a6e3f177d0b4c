import { z } from 'zod';

import { EXPORT_KINDS } from './service';

export const exportQuerySchema = z.object({
  type: z.enum(EXPORT_KINDS),
});
