export type PlatformCredentials = {
  serverUrl: string;
  apiToken: string;
};

export type ProjectView = {
  uid: string;
  name: string;
  url: string | null;
};

export type ProjectStatus = 'Deployed' | 'Draft' | 'Archived';

export type ProjectRecord = {
  uid: string;
  name: string;
  status: ProjectStatus;
  submissionCount: number;
  dateCreated: Date | null;
  dateModified: Date | null;
  countryLabel: string;
  countryCode: string;
  sector: string | null;
  ownerUsername: string | null;
  sourceViewUid: string | null;
  sourceViewName: string;
  isDeployed: boolean;
  isArchived: boolean;
};

export type Submission = Record<string, unknown>;
