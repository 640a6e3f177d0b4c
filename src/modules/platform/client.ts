import { createHash } from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';

import { logger } from '../../config/logger';
import { withCache } from '../../shared/cache';
import { PlatformFetchError } from './errors';
import {
  assetDetailSchema,
  paginatedResponseSchema,
  projectViewSchema,
  rawAssetSchema,
  type AssetDetail,
  type RawAsset,
} from './schemas';
import type { PlatformCredentials, ProjectView, Submission } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type PlatformClientOptions = PlatformCredentials & {
  timeoutMs: number;
  fetchFn?: FetchLike;
};

type RequestContext = {
  assetUid?: string;
  accept?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const readJson = (response: Response): Promise<unknown> => response.json();

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Thin client for the survey platform's v2 REST API.
 *
 * Every call is bounded by `timeoutMs` (body download included) and fails with a single
 * {@link PlatformFetchError}; nothing is retried.
 */
export class PlatformClient {
  readonly serverUrl: string;
  readonly cacheNamespace: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: PlatformClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
    const digest = createHash('sha256').update(`${this.serverUrl}\n${this.apiToken}`).digest('hex');
    this.cacheNamespace = `platform:${digest.slice(0, 24)}:`;
  }

  async listProjectViews(): Promise<ProjectView[]> {
    const items = await this.paginate('/api/v2/project-views/?format=json', {});
    return this.parseItems(items, projectViewSchema, 'project view').map((view) => ({
      uid: view.uid,
      name: view.name ?? view.uid,
      url: view.url ?? null,
    }));
  }

  async listViewAssets(viewUid: string): Promise<RawAsset[]> {
    const path = `/api/v2/project-views/${encodeURIComponent(viewUid)}/assets/?format=json`;
    const items = await this.paginate(path, {});
    return this.parseItems(items, rawAssetSchema, 'asset');
  }

  async listAssets(): Promise<RawAsset[]> {
    const items = await this.paginate('/api/v2/assets/?format=json', {});
    return this.parseItems(items, rawAssetSchema, 'asset');
  }

  async getAssetDetail(uid: string): Promise<AssetDetail> {
    const path = `/api/v2/assets/${encodeURIComponent(uid)}/?format=json`;
    const body = await withCache(`${this.cacheNamespace}${path}`, () =>
      this.send(path, { assetUid: uid }, readJson),
    );
    const parsed = assetDetailSchema.safeParse(body);
    if (!parsed.success) {
      throw new PlatformFetchError(`Unexpected asset detail payload for asset ${uid}`, {
        endpoint: path,
        assetUid: uid,
        cause: parsed.error.message,
      });
    }
    return parsed.data;
  }

  /** Returns the deployed XForm, or null when the asset has none. */
  async getAssetXForm(uid: string): Promise<string | null> {
    const path = `/api/v2/assets/${encodeURIComponent(uid)}.xml`;
    try {
      const xml = await this.send(path, { assetUid: uid, accept: 'application/xml' }, (response) => response.text());
      return xml.trim().length > 0 ? xml : null;
    } catch (error) {
      if (error instanceof PlatformFetchError && isRecord(error.details) && error.details.status === 404) {
        return null;
      }
      throw error;
    }
  }

  async getAssetXls(uid: string): Promise<Buffer> {
    const path = `/api/v2/assets/${encodeURIComponent(uid)}.xls`;
    return this.send(path, { assetUid: uid, accept: '*/*' }, async (response) =>
      Buffer.from(await response.arrayBuffer()),
    );
  }

  async listSubmissions(uid: string): Promise<Submission[]> {
    const path = `/api/v2/assets/${encodeURIComponent(uid)}/data/?format=json`;
    const items = await withCache(`${this.cacheNamespace}${path}`, () => this.paginate(path, { assetUid: uid }));
    return items.filter(isRecord);
  }

  private async paginate(path: string, context: RequestContext): Promise<unknown[]> {
    const items: unknown[] = [];
    let next: string | null = path;
    let total: number | undefined;

    while (next) {
      const endpoint: string = next;
      const body: unknown = await this.send(endpoint, context, readJson);
      const page = paginatedResponseSchema.safeParse(body);
      if (!page.success) {
        throw new PlatformFetchError(`Unexpected paginated payload from ${this.endpointLabel(endpoint)}`, {
          endpoint: this.endpointLabel(endpoint),
          assetUid: context.assetUid,
          cause: page.error.message,
        });
      }

      total ??= page.data.count;
      items.push(...page.data.results);
      logger.debug({ endpoint: this.endpointLabel(endpoint), fetched: items.length, total }, 'fetched platform page');
      next = page.data.next ?? null;
    }

    return items;
  }

  private parseItems<T>(items: unknown[], schema: ZodType<T, ZodTypeDef, unknown>, label: string): T[] {
    const parsed: T[] = [];
    for (const item of items) {
      const result = schema.safeParse(item);
      if (result.success) {
        parsed.push(result.data);
      } else {
        logger.warn({ item, issues: result.error.issues }, `skipping unexpected ${label} item`);
      }
    }
    return parsed;
  }

  private endpointLabel(pathOrUrl: string): string {
    if (!/^https?:\/\//i.test(pathOrUrl)) {
      return pathOrUrl;
    }
    const url = new URL(pathOrUrl);
    return `${url.pathname}${url.search}`;
  }

  private async send<T>(pathOrUrl: string, context: RequestContext, read: (response: Response) => Promise<T>): Promise<T> {
    const url = /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : `${this.serverUrl}${pathOrUrl}`;
    const endpoint = this.endpointLabel(pathOrUrl);
    const subject = context.assetUid ? ` for asset ${context.assetUid}` : '';

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    logger.debug({ endpoint, assetUid: context.assetUid }, 'platform request');

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers: {
          Authorization: `Token ${this.apiToken}`,
          Accept: context.accept ?? 'application/json',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new PlatformFetchError(`Request to ${endpoint}${subject} failed with status ${response.status}`, {
          endpoint,
          assetUid: context.assetUid,
          status: response.status,
        });
      }

      return await read(response);
    } catch (error) {
      if (error instanceof PlatformFetchError) {
        logger.error({ endpoint, assetUid: context.assetUid, details: error.details }, 'platform request failed');
        throw error;
      }

      const failure = timedOut
        ? new PlatformFetchError(`Request to ${endpoint}${subject} timed out after ${this.timeoutMs}ms`, {
            endpoint,
            assetUid: context.assetUid,
            timedOut: true,
            cause: describeCause(error),
          })
        : new PlatformFetchError(`Request to ${endpoint}${subject} failed: ${describeCause(error)}`, {
            endpoint,
            assetUid: context.assetUid,
            cause: describeCause(error),
          });
      logger.error({ endpoint, assetUid: context.assetUid, details: failure.details }, 'platform request failed');
      throw failure;
    } finally {
      clearTimeout(timeout);
    }
  }
}
