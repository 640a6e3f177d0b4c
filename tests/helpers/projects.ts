import type { ProjectRecord } from '../../src/modules/projects/types';

export function buildProject(overrides: Partial<ProjectRecord> & Pick<ProjectRecord, 'uid' | 'name'>): ProjectRecord {
  return {
    status: 'Deployed',
    submissionCount: 0,
    dateCreated: null,
    dateModified: null,
    countryLabel: '',
    countryCode: '',
    sector: null,
    ownerUsername: 'field-team',
    sourceViewUid: null,
    sourceViewName: 'Direct Assets API',
    isDeployed: true,
    isArchived: false,
    ...overrides,
  };
}
