import type { RawAsset } from './schemas';
import type { ProjectRecord, ProjectStatus } from './types';

export const DIRECT_SOURCE_NAME = 'Direct Assets API';

export type AssetSource = {
  viewUid: string | null;
  viewName: string;
};

export function parseDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function resolveStatus(asset: Pick<RawAsset, 'deployment_status' | 'is_archived'>): ProjectStatus {
  if (asset.deployment_status === 'deployed') {
    return 'Deployed';
  }
  if (asset.is_archived) {
    return 'Archived';
  }
  return 'Draft';
}

/** Display name of a sector setting, which may be an object (`name`/`label`) or a plain string. */
export function sectorDisplayName(sector: unknown): string | null {
  if (typeof sector === 'string') {
    const trimmed = sector.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (typeof sector === 'object' && sector !== null && !Array.isArray(sector)) {
    const entries = Object.entries(sector);
    if (entries.length === 0) {
      return null;
    }
    const fields = Object.fromEntries(entries);
    for (const key of ['name', 'label']) {
      const value = fields[key];
      if (typeof value === 'string' && value.trim().length > 0) {
        return value.trim();
      }
    }
    return JSON.stringify(sector);
  }

  return null;
}

function firstCountry(country: NonNullable<RawAsset['settings']>['country']): { label: string; code: string } {
  if (Array.isArray(country)) {
    const first = country[0];
    return { label: first?.label ?? '', code: first?.value ?? '' };
  }
  if (typeof country === 'string') {
    return { label: country, code: '' };
  }
  if (country) {
    return { label: country.label ?? '', code: country.value ?? '' };
  }
  return { label: '', code: '' };
}

export function isSurvey(asset: RawAsset): boolean {
  return asset.asset_type === 'survey';
}

export function mapAssetToProject(asset: RawAsset, source: AssetSource): ProjectRecord {
  const country = firstCountry(asset.settings?.country);

  return {
    uid: asset.uid,
    name: asset.name ?? '',
    status: resolveStatus(asset),
    submissionCount: asset.deployment__submission_count ?? 0,
    dateCreated: parseDate(asset.date_created),
    dateModified: parseDate(asset.date_modified),
    countryLabel: country.label,
    countryCode: country.code,
    sector: sectorDisplayName(asset.settings?.sector),
    ownerUsername: asset.owner__username ?? null,
    sourceViewUid: source.viewUid,
    sourceViewName: source.viewName,
    isDeployed: asset.is_deployed ?? false,
    isArchived: asset.is_archived ?? false,
  };
}
