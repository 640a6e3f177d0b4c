import type { ProjectStatus } from '../platform/types';
import type { FilterOptions, ProjectFilter, ProjectRecord, ProjectSummary } from './types';

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function hasValues<T>(values: readonly T[] | undefined): values is readonly T[] {
  return Array.isArray(values) && values.length > 0;
}

export function matchesFilter(record: ProjectRecord, filter: ProjectFilter): boolean {
  const keywords = (filter.nameKeywords ?? []).map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
  if (keywords.length > 0) {
    const name = record.name.toLowerCase();
    if (!keywords.some((keyword) => name.includes(keyword))) {
      return false;
    }
  }

  if (hasValues(filter.countries) && !filter.countries.includes(record.countryLabel)) {
    return false;
  }

  if (hasValues(filter.statuses) && !filter.statuses.includes(record.status)) {
    return false;
  }

  if (hasValues(filter.sectors) && (record.sector === null || !filter.sectors.includes(record.sector))) {
    return false;
  }

  if (filter.createdFrom || filter.createdTo) {
    if (!record.dateCreated) {
      return false;
    }
    const created = toIsoDate(record.dateCreated);
    if (filter.createdFrom && created < filter.createdFrom) {
      return false;
    }
    if (filter.createdTo && created > filter.createdTo) {
      return false;
    }
  }

  if (filter.minSubmissions !== undefined && record.submissionCount < filter.minSubmissions) {
    return false;
  }

  return true;
}

export function filterProjects(records: readonly ProjectRecord[], filter: ProjectFilter): ProjectRecord[] {
  return records.filter((record) => matchesFilter(record, filter));
}

export function summarizeProjects(records: readonly ProjectRecord[]): ProjectSummary {
  return {
    totalProjects: records.length,
    totalSubmissions: records.reduce((sum, record) => sum + record.submissionCount, 0),
  };
}

function distinctSorted<T extends string>(values: Array<T | null>): T[] {
  const unique = new Set<T>();
  for (const value of values) {
    if (value) {
      unique.add(value);
    }
  }
  return Array.from(unique).sort((a, b) => a.localeCompare(b));
}

/**
 * Most recently fetched set of projects. Replacing swaps the whole frozen array at once, so
 * readers never observe a partially loaded set.
 */
export class ProjectStore {
  private records: readonly ProjectRecord[] = Object.freeze([]);
  private loadedAt: Date | null = null;

  replace(records: readonly ProjectRecord[]): void {
    const seen = new Set<string>();
    const unique: ProjectRecord[] = [];
    for (const record of records) {
      if (seen.has(record.uid)) {
        continue;
      }
      seen.add(record.uid);
      unique.push(Object.freeze({ ...record }));
    }

    this.records = Object.freeze(unique);
    this.loadedAt = new Date();
  }

  all(): readonly ProjectRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }

  get isLoaded(): boolean {
    return this.loadedAt !== null;
  }

  get lastLoadedAt(): Date | null {
    return this.loadedAt;
  }

  findByUid(uid: string): ProjectRecord | undefined {
    return this.records.find((record) => record.uid === uid);
  }

  filter(filter: ProjectFilter): ProjectRecord[] {
    return filterProjects(this.records, filter);
  }

  filterOptions(): FilterOptions {
    const createdDates = this.records
      .map((record) => record.dateCreated)
      .filter((date): date is Date => date !== null)
      .map(toIsoDate)
      .sort();

    return {
      countries: distinctSorted(this.records.map((record) => record.countryLabel)),
      statuses: distinctSorted<ProjectStatus>(this.records.map((record) => record.status)),
      sectors: distinctSorted(this.records.map((record) => record.sector)),
      createdRange: {
        from: createdDates[0] ?? null,
        to: createdDates[createdDates.length - 1] ?? null,
      },
      maxSubmissions: this.records.reduce((max, record) => Math.max(max, record.submissionCount), 0),
    };
  }
}
