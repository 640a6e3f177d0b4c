import { logger } from '../../config/logger';
import { AppError, ConflictError } from '../../shared/errors';
import { PlatformFetchError } from '../platform/errors';
import { DIRECT_SOURCE_NAME, isSurvey, mapAssetToProject } from '../platform/mappers';
import type { RawAsset } from '../platform/schemas';
import type { ProjectView } from '../platform/types';
import type { DashboardSession } from '../session/session';
import { summarizeProjects } from './store';
import type { LoadResult, LoadSource, ProjectRecord } from './types';

export type LoadProjectsInput = {
  source: LoadSource;
  viewUids: string[];
  surveysOnly: boolean;
};

export async function fetchProjectViews(session: DashboardSession): Promise<ProjectView[]> {
  const views = await session.client.listProjectViews();
  session.setProjectViews(views);
  logger.info({ count: views.length }, 'fetched project views');
  return views;
}

type SourcedAssets = {
  assets: RawAsset[];
  viewUid: string | null;
  viewName: string;
};

async function collectFromViews(
  session: DashboardSession,
  viewUids: readonly string[],
): Promise<{ batches: SourcedAssets[]; skipped: LoadResult['skippedViews'] }> {
  const batches: SourcedAssets[] = [];
  const skipped: LoadResult['skippedViews'] = [];

  for (const viewUid of viewUids) {
    try {
      const assets = await session.client.listViewAssets(viewUid);
      batches.push({ assets, viewUid, viewName: session.viewName(viewUid) });
    } catch (error) {
      if (!(error instanceof PlatformFetchError)) {
        throw error;
      }
      logger.warn({ viewUid, err: error }, 'skipping unreachable project view');
      skipped.push({ viewUid, reason: error.message });
    }
  }

  if (batches.length === 0) {
    throw new AppError('Could not load assets from any selected project view', 502, { skippedViews: skipped });
  }

  return { batches, skipped };
}

/**
 * Fetches assets and replaces the session's project set. Previously loaded projects stay in
 * place when the fetch fails, and a load overtaken by a newer one is rejected.
 */
export async function loadProjects(session: DashboardSession, input: LoadProjectsInput): Promise<LoadResult> {
  const ticket = session.beginLoad();

  const { batches, skipped } =
    input.source === 'project_views'
      ? await collectFromViews(session, input.viewUids)
      : {
          batches: [{ assets: await session.client.listAssets(), viewUid: null, viewName: DIRECT_SOURCE_NAME }],
          skipped: [],
        };

  const records: ProjectRecord[] = [];
  for (const batch of batches) {
    for (const asset of batch.assets) {
      if (input.surveysOnly && !isSurvey(asset)) {
        continue;
      }
      records.push(mapAssetToProject(asset, { viewUid: batch.viewUid, viewName: batch.viewName }));
    }
  }

  if (!session.commitProjects(ticket, records)) {
    throw new ConflictError('Project load was superseded by a newer request');
  }

  const loaded = session.projects.size;
  logger.info({ source: input.source, loaded, skipped: skipped.length }, 'projects loaded');
  return { loaded, skippedViews: skipped };
}

export function describeProjects(session: DashboardSession) {
  const projects = session.displayedProjects;
  return {
    data: projects,
    filter: session.filter,
    summary: summarizeProjects(projects),
    total: session.projects.size,
    loadedAt: session.projects.lastLoadedAt,
  };
}
