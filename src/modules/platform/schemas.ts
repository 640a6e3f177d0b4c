import { z } from 'zod';

export const paginatedResponseSchema = z.object({
  count: z.number().int().nonnegative().optional(),
  next: z.string().nullable().optional(),
  results: z.array(z.unknown()).default([]),
});

export const projectViewSchema = z.object({
  uid: z.string(),
  name: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
});

const countryEntrySchema = z.object({
  label: z.string().nullable().optional(),
  value: z.string().nullable().optional(),
});

export const rawAssetSchema = z
  .object({
    uid: z.string(),
    name: z.string().nullable().optional(),
    asset_type: z.string().nullable().optional(),
    deployment_status: z.string().nullable().optional(),
    deployment__submission_count: z.number().nullable().optional(),
    date_created: z.string().nullable().optional(),
    date_modified: z.string().nullable().optional(),
    owner__username: z.string().nullable().optional(),
    is_deployed: z.boolean().nullable().optional(),
    is_archived: z.boolean().nullable().optional(),
    settings: z
      .object({
        country: z.union([z.array(countryEntrySchema), countryEntrySchema, z.string()]).nullable().optional(),
        sector: z.unknown().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export const assetDetailSchema = z
  .object({
    uid: z.string(),
    name: z.string().nullable().optional(),
    content: z.unknown().optional(),
  })
  .passthrough();

export type PaginatedResponse = z.infer<typeof paginatedResponseSchema>;
export type RawAsset = z.infer<typeof rawAssetSchema>;
export type AssetDetail = z.infer<typeof assetDetailSchema>;
