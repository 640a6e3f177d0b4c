import { describe, expect, it, vi } from 'vitest';

import { PlatformClient, type FetchLike } from '../src/modules/platform/client';
import { ConfigurationError } from '../src/modules/platform/errors';
import { analyseSessionForms } from '../src/modules/forms/service';
import { loadProjects } from '../src/modules/projects/service';
import { resolveCredentials } from '../src/modules/session/credentials';
import { DashboardSession, SessionRegistry } from '../src/modules/session/session';
import { ConflictError } from '../src/shared/errors';
import { jsonResponse } from './helpers/fake-platform';
import { buildProject } from './helpers/projects';

const credentials = { serverUrl: 'https://survey.example.org', apiToken: 'test-token' };
const defaultServer = 'https://default.example.org';

function newClient(fetchFn: FetchLike) {
  return new PlatformClient({ ...credentials, timeoutMs: 1000, fetchFn });
}

const unusedFetch: FetchLike = async () => new Response('', { status: 500 });

describe('resolveCredentials', () => {
  it('falls back to the default server only when the URL is omitted', () => {
    expect(resolveCredentials({ apiToken: ' test-token ' }, defaultServer)).toEqual({
      serverUrl: defaultServer,
      apiToken: 'test-token',
    });
    expect(resolveCredentials({ serverUrl: 'https://kf.example.org/', apiToken: 'test-token' }, defaultServer)).toEqual({
      serverUrl: 'https://kf.example.org',
      apiToken: 'test-token',
    });
  });

  it('rejects missing values with a message naming the field', () => {
    expect(() => resolveCredentials({ apiToken: '  ' }, defaultServer)).toThrow(
      new ConfigurationError('API token is required'),
    );
    expect(() => resolveCredentials({ serverUrl: '', apiToken: 'test-token' }, defaultServer)).toThrow(
      'Server URL is required',
    );
    expect(() => resolveCredentials({ serverUrl: 'ftp://files.example.org', apiToken: 'test-token' }, defaultServer)).toThrow(
      'Server URL must use http or https',
    );
  });
});

describe('SessionRegistry', () => {
  it('expires sessions after the inactivity window and extends it on use', () => {
    const registry = new SessionRegistry(60_000, () => newClient(unusedFetch));
    const start = new Date('2024-05-01T10:00:00Z');
    const session = registry.create(credentials, start);

    expect(registry.get(session.id, new Date('2024-05-01T10:00:50Z'))).toBe(session);
    expect(registry.get(session.id, new Date('2024-05-01T10:01:40Z'))).toBe(session);
    expect(registry.get(session.id, new Date('2024-05-01T10:02:40Z'))).toBeNull();
    expect(registry.size).toBe(0);
  });

  it('ends a session on delete', () => {
    const registry = new SessionRegistry(60_000, () => newClient(unusedFetch));
    const session = registry.create(credentials);

    expect(registry.delete(session.id)).toBe(true);
    expect(registry.get(session.id)).toBeNull();
  });
});

describe('DashboardSession', () => {
  it('re-applies the current filter when projects are replaced', () => {
    const session = new DashboardSession(credentials, newClient(unusedFetch), 60_000);
    session.applyFilter({ countries: ['Kenya'] });

    session.commitProjects(session.beginLoad(), [
      buildProject({ uid: 'a1', name: 'Kenya baseline', countryLabel: 'Kenya' }),
      buildProject({ uid: 'a2', name: 'Uganda baseline', countryLabel: 'Uganda' }),
    ]);

    expect(session.displayedProjects.map((project) => project.uid)).toEqual(['a1']);
  });

  it('clears the last search when forms are analysed again', () => {
    const session = new DashboardSession(credentials, newClient(unusedFetch), 60_000);
    session.commitForms(session.beginAnalysis(), []);
    session.recordSearch({ keywords: ['water'], method: 'token_set_ratio', threshold: 80 }, []);

    expect(session.lastSearch).not.toBeNull();
    session.commitForms(session.beginAnalysis(), []);
    expect(session.lastSearch).toBeNull();
  });

  it('rejects a project load overtaken by a newer one and keeps the newer result', async () => {
    const pending: Array<(response: Response) => void> = [];
    const fetchFn: FetchLike = () => new Promise<Response>((resolve) => pending.push(resolve));
    const session = new DashboardSession(credentials, newClient(fetchFn), 60_000);

    const first = loadProjects(session, { source: 'assets', viewUids: [], surveysOnly: false });
    const second = loadProjects(session, { source: 'assets', viewUids: [], surveysOnly: false });
    await vi.waitFor(() => expect(pending).toHaveLength(2));

    pending[1](jsonResponse({ next: null, results: [{ uid: 'aNew', name: 'Newer' }] }));
    await expect(second).resolves.toEqual({ loaded: 1, skippedViews: [] });

    pending[0](jsonResponse({ next: null, results: [{ uid: 'aOld', name: 'Older' }] }));
    await expect(first).rejects.toBeInstanceOf(ConflictError);

    expect(session.projects.all().map((project) => project.uid)).toEqual(['aNew']);
  });

  it('discards a form analysis overtaken by a newer one', async () => {
    const pending: Array<(response: Response) => void> = [];
    const fetchFn: FetchLike = () => new Promise<Response>((resolve) => pending.push(resolve));
    const session = new DashboardSession(credentials, newClient(fetchFn), 60_000);
    session.commitProjects(session.beginLoad(), [buildProject({ uid: 'aWater', name: 'Water point survey' })]);

    const first = analyseSessionForms(session);
    const second = analyseSessionForms(session);
    await vi.waitFor(() => expect(pending).toHaveLength(2));

    pending[1](jsonResponse({ uid: 'aWater', content: { survey: [{ type: 'text', name: 'newer' }] } }));
    await expect(second).resolves.toMatchObject({ totalForms: 1, failedForms: 0 });

    pending[0](jsonResponse({ uid: 'aWater', content: { survey: [{ type: 'text', name: 'older' }] } }));
    await expect(first).rejects.toThrow(new ConflictError('Form analysis was superseded by a newer request'));

    expect(session.forms[0].extraction.questions.map((question) => question.name)).toEqual(['newer']);
  });

  it('reports a stale analysis ticket as not committed', () => {
    const session = new DashboardSession(credentials, newClient(unusedFetch), 60_000);
    const stale = session.beginAnalysis();
    const current = session.beginAnalysis();

    expect(session.commitForms(stale, [])).toBe(false);
    expect(session.formsAnalysedAt).toBeNull();
    expect(session.commitForms(current, [])).toBe(true);
  });
});
