import type { ProjectRecord, ProjectStatus } from '../platform/types';

/** Every supplied predicate must hold; unset or empty ones match everything. */
export type ProjectFilter = {
  nameKeywords?: string[];
  countries?: string[];
  statuses?: ProjectStatus[];
  sectors?: string[];
  /** Inclusive, `YYYY-MM-DD`, compared with the UTC calendar date of creation. */
  createdFrom?: string;
  createdTo?: string;
  minSubmissions?: number;
};

export type FilterOptions = {
  countries: string[];
  statuses: ProjectStatus[];
  sectors: string[];
  createdRange: { from: string | null; to: string | null };
  maxSubmissions: number;
};

export type ProjectSummary = {
  totalProjects: number;
  totalSubmissions: number;
};

export type LoadSource = 'project_views' | 'assets';

export type LoadResult = {
  loaded: number;
  skippedViews: Array<{ viewUid: string; reason: string }>;
};

export type { ProjectRecord };
