import { getEnv } from '../../config/env';
import { logger } from '../../config/logger';
import { AppError, ConflictError } from '../../shared/errors';
import type { DashboardSession, SearchSnapshot } from '../session/session';
import { orderResults, searchForms, type ResultOrder, type SearchParams } from './aggregator';
import { MATCH_STRATEGIES, parseKeywords, type MatchMethod } from './matcher';

export type SearchRequest = {
  keywords: string | string[];
  method?: MatchMethod;
  threshold?: number;
};

export type ResultView = {
  onlyMatched: boolean;
  orderBy: ResultOrder;
};

export function resolveSearchParams(input: SearchRequest): SearchParams {
  const keywords = parseKeywords(input.keywords);
  if (keywords.length === 0) {
    throw new AppError('Enter at least one keyword', 400);
  }

  const env = getEnv();
  return {
    keywords,
    method: input.method ?? env.SEARCH_DEFAULT_METHOD,
    threshold: input.threshold ?? Number(env.SEARCH_DEFAULT_THRESHOLD),
  };
}

export function presentSearch(snapshot: SearchSnapshot, view: ResultView) {
  const ordered = orderResults(snapshot.results, view.orderBy);
  const data = view.onlyMatched ? ordered.filter((result) => result.matchCount > 0) : ordered;

  return {
    params: {
      ...snapshot.params,
      methodLabel: MATCH_STRATEGIES[snapshot.params.method].label,
    },
    searchedAt: snapshot.searchedAt,
    formsSearched: snapshot.results.length,
    formsMatched: snapshot.results.filter((result) => result.matchCount > 0).length,
    data,
  };
}

/** Searches the session's analysed forms; the new search replaces the previous one. */
export function runSearch(session: DashboardSession, input: SearchRequest, view: ResultView) {
  if (!session.formsAnalysedAt) {
    throw new ConflictError('Analyse forms before searching');
  }

  const params = resolveSearchParams(input);
  const results = searchForms(session.forms, params);
  const snapshot = session.recordSearch(params, results);

  logger.info(
    { keywords: params.keywords.length, method: params.method, threshold: params.threshold, forms: results.length },
    'form search completed',
  );

  return presentSearch(snapshot, view);
}

export function getLastSearch(session: DashboardSession, view: ResultView) {
  const snapshot = session.lastSearch;
  if (!snapshot) {
    return { data: null };
  }
  return presentSearch(snapshot, view);
}

export function listMatchMethods() {
  return Object.entries(MATCH_STRATEGIES).map(([method, strategy]) => ({
    method,
    label: strategy.label,
    description: strategy.description,
  }));
}
