import { randomUUID } from 'node:crypto';

import type { PlatformClient } from '../platform/client';
import type { PlatformCredentials, ProjectView } from '../platform/types';
import { ProjectStore } from '../projects/store';
import type { ProjectFilter, ProjectRecord } from '../projects/types';
import type { AnalysedForm } from '../forms/types';
import type { MatchResult, SearchParams } from '../search/aggregator';

export type SearchSnapshot = {
  params: SearchParams;
  results: MatchResult[];
  searchedAt: Date;
};

/**
 * Everything one dashboard user has loaded. Handlers mutate it only through these methods.
 *
 * Loads and analyses are ticketed: starting a new one invalidates the ticket of any still in
 * flight, whose result is then discarded instead of committed.
 */
export class DashboardSession {
  readonly id = randomUUID();
  readonly createdAt = new Date();
  readonly projects = new ProjectStore();

  private views: ProjectView[] = [];
  private currentFilter: ProjectFilter = {};
  private displayed: ProjectRecord[] = [];
  private analysedForms: AnalysedForm[] = [];
  private analysedAt: Date | null = null;
  private search: SearchSnapshot | null = null;
  private loadTicket = 0;
  private analysisTicket = 0;
  private lastSeenAt: Date;

  constructor(
    readonly credentials: PlatformCredentials,
    readonly client: PlatformClient,
    private readonly ttlMs: number,
    now = new Date(),
  ) {
    this.lastSeenAt = now;
  }

  /** Extends the inactivity deadline. */
  touch(now = new Date()): void {
    this.lastSeenAt = now;
  }

  get expiresAt(): Date {
    return new Date(this.lastSeenAt.getTime() + this.ttlMs);
  }

  get projectViews(): readonly ProjectView[] {
    return this.views;
  }

  setProjectViews(views: ProjectView[]): void {
    this.views = [...views];
  }

  viewName(uid: string): string {
    return this.views.find((view) => view.uid === uid)?.name ?? 'Unknown';
  }

  beginLoad(): number {
    this.loadTicket += 1;
    return this.loadTicket;
  }

  /** Replaces the project set and re-applies the current filter. False when superseded. */
  commitProjects(ticket: number, records: readonly ProjectRecord[]): boolean {
    if (ticket !== this.loadTicket) {
      return false;
    }
    this.projects.replace(records);
    this.displayed = this.projects.filter(this.currentFilter);
    return true;
  }

  applyFilter(filter: ProjectFilter): ProjectRecord[] {
    this.currentFilter = { ...filter };
    this.displayed = this.projects.filter(this.currentFilter);
    return this.displayed;
  }

  get filter(): ProjectFilter {
    return { ...this.currentFilter };
  }

  get displayedProjects(): readonly ProjectRecord[] {
    return this.displayed;
  }

  beginAnalysis(): number {
    this.analysisTicket += 1;
    return this.analysisTicket;
  }

  /** Stores freshly analysed forms and drops the previous search, which they invalidate. */
  commitForms(ticket: number, forms: AnalysedForm[]): boolean {
    if (ticket !== this.analysisTicket) {
      return false;
    }
    this.analysedForms = forms;
    this.analysedAt = new Date();
    this.search = null;
    return true;
  }

  get forms(): readonly AnalysedForm[] {
    return this.analysedForms;
  }

  get formsAnalysedAt(): Date | null {
    return this.analysedAt;
  }

  recordSearch(params: SearchParams, results: MatchResult[]): SearchSnapshot {
    this.search = { params, results, searchedAt: new Date() };
    return this.search;
  }

  get lastSearch(): SearchSnapshot | null {
    return this.search;
  }

  isExpired(now: Date): boolean {
    return now.getTime() >= this.expiresAt.getTime();
  }
}

export type ClientFactory = (credentials: PlatformCredentials) => PlatformClient;

export class SessionRegistry {
  private readonly sessions = new Map<string, DashboardSession>();

  constructor(
    private readonly ttlMs: number,
    private readonly createClient: ClientFactory,
  ) {}

  create(credentials: PlatformCredentials, now = new Date()): DashboardSession {
    this.prune(now);
    const session = new DashboardSession(credentials, this.createClient(credentials), this.ttlMs, now);
    this.sessions.set(session.id, session);
    return session;
  }

  /** Returns a live session and marks it active; expired ones are dropped. */
  get(id: string, now = new Date()): DashboardSession | null {
    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }
    if (session.isExpired(now)) {
      this.sessions.delete(id);
      return null;
    }
    session.touch(now);
    return session;
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  prune(now = new Date()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.isExpired(now)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
