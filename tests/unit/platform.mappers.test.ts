import { describe, expect, it } from 'vitest';

import {
  DIRECT_SOURCE_NAME,
  mapAssetToProject,
  resolveStatus,
  sectorDisplayName,
} from '../../src/modules/platform/mappers';
import { rawAssetSchema } from '../../src/modules/platform/schemas';

describe('resolveStatus', () => {
  it('prefers deployment over archiving', () => {
    expect(resolveStatus({ deployment_status: 'deployed', is_archived: true })).toBe('Deployed');
    expect(resolveStatus({ deployment_status: 'archived', is_archived: true })).toBe('Archived');
    expect(resolveStatus({ deployment_status: 'draft', is_archived: false })).toBe('Draft');
  });
});

describe('sectorDisplayName', () => {
  it('reads the display name from objects and strings', () => {
    expect(sectorDisplayName({ label: 'Health', value: 'health' })).toBe('Health');
    expect(sectorDisplayName({ name: 'Education' })).toBe('Education');
    expect(sectorDisplayName('  Protection ')).toBe('Protection');
    expect(sectorDisplayName({})).toBeNull();
    expect(sectorDisplayName(null)).toBeNull();
  });
});

describe('mapAssetToProject', () => {
  it('maps an asset listing entry to a project record', () => {
    const asset = rawAssetSchema.parse({
      uid: 'aKx9',
      name: 'Nutrition survey',
      asset_type: 'survey',
      deployment_status: 'deployed',
      deployment__submission_count: 37,
      date_created: '2024-02-01T10:15:00Z',
      date_modified: 'not a date',
      owner__username: 'field-team',
      is_deployed: true,
      is_archived: false,
      settings: {
        country: [
          { label: 'Somalia', value: 'SOM' },
          { label: 'Kenya', value: 'KEN' },
        ],
        sector: { label: 'Nutrition', value: 'nutrition' },
      },
    });

    expect(mapAssetToProject(asset, { viewUid: null, viewName: DIRECT_SOURCE_NAME })).toEqual({
      uid: 'aKx9',
      name: 'Nutrition survey',
      status: 'Deployed',
      submissionCount: 37,
      dateCreated: new Date('2024-02-01T10:15:00Z'),
      dateModified: null,
      countryLabel: 'Somalia',
      countryCode: 'SOM',
      sector: 'Nutrition',
      ownerUsername: 'field-team',
      sourceViewUid: null,
      sourceViewName: 'Direct Assets API',
      isDeployed: true,
      isArchived: false,
    });
  });

  it('fills defaults for a sparse asset', () => {
    const asset = rawAssetSchema.parse({ uid: 'aSparse' });

    expect(mapAssetToProject(asset, { viewUid: 'pv1', viewName: 'Region A' })).toMatchObject({
      name: '',
      status: 'Draft',
      submissionCount: 0,
      countryLabel: '',
      countryCode: '',
      sector: null,
      sourceViewUid: 'pv1',
      sourceViewName: 'Region A',
    });
  });
});
