import type { ProjectRecord } from '../projects/types';
import { summarizeProjects } from '../projects/store';
import type { AnalyticsOverview, CountEntry, TopProject } from './types';

export const DEFAULT_TOP = 10;

/** Counts by key, most frequent first, ties broken by key. */
export function countBy(records: readonly ProjectRecord[], keyOf: (record: ProjectRecord) => string | null): CountEntry[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const key = keyOf(record);
    if (key === null) {
      continue;
    }
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  return Array.from(counts, ([key, count]) => ({ key, count })).sort(
    (a, b) => b.count - a.count || a.key.localeCompare(b.key),
  );
}

export function topBySubmissions(records: readonly ProjectRecord[], limit = DEFAULT_TOP): TopProject[] {
  return [...records]
    .sort((a, b) => b.submissionCount - a.submissionCount || a.name.localeCompare(b.name))
    .slice(0, limit)
    .map((record) => ({ uid: record.uid, name: record.name, submissionCount: record.submissionCount }));
}

export function createdPerMonth(records: readonly ProjectRecord[]): CountEntry[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    if (!record.dateCreated) {
      continue;
    }
    const month = record.dateCreated.toISOString().slice(0, 7);
    counts.set(month, (counts.get(month) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => ({ key, count })).sort((a, b) => a.key.localeCompare(b.key));
}

export function getAnalyticsOverview(records: readonly ProjectRecord[], top = DEFAULT_TOP): AnalyticsOverview {
  const summary = summarizeProjects(records);
  // Projects without a country are left out of the breakdown.
  const byCountry = countBy(records, (record) => record.countryLabel || null);

  return {
    totals: {
      projects: summary.totalProjects,
      submissions: summary.totalSubmissions,
      countries: byCountry.length,
      deployed: records.filter((record) => record.status === 'Deployed').length,
    },
    byCountry,
    topBySubmissions: topBySubmissions(records, top),
    createdPerMonth: createdPerMonth(records),
    bySourceView: countBy(records, (record) => record.sourceViewName),
  };
}
