import { z } from 'zod';

const isoDate = /^\d{4}-\d{2}-\d{2}$/;

function splitList(value: string | string[]): string[] {
  const parts = typeof value === 'string' ? value.split(',') : value;
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

// Accepts either a JSON array or a comma-separated string.
const listInput = z.union([z.string(), z.array(z.string())]).transform(splitList);

export const projectStatusSchema = z.enum(['Deployed', 'Draft', 'Archived']);

export const loadProjectsBodySchema = z
  .object({
    source: z.enum(['project_views', 'assets']).default('assets'),
    viewUids: listInput.default([]),
    surveysOnly: z.boolean().default(true),
  })
  .refine((body) => body.source !== 'project_views' || body.viewUids.length > 0, {
    message: 'Select at least one project view',
    path: ['viewUids'],
  });

export const projectFilterBodySchema = z
  .object({
    nameKeywords: listInput.optional(),
    countries: z.array(z.string()).optional(),
    statuses: z.array(projectStatusSchema).optional(),
    sectors: z.array(z.string()).optional(),
    createdFrom: z.string().regex(isoDate).optional(),
    createdTo: z.string().regex(isoDate).optional(),
    minSubmissions: z.number().int().min(0).optional(),
  })
  .refine((filter) => !filter.createdFrom || !filter.createdTo || filter.createdFrom <= filter.createdTo, {
    message: 'createdFrom must not be after createdTo',
    path: ['createdFrom'],
  });

export type LoadProjectsBody = z.infer<typeof loadProjectsBodySchema>;
export type ProjectFilterBody = z.infer<typeof projectFilterBodySchema>;
