import { logger } from '../../config/logger';
import { runWithLogContext } from '../../observability/log-context';
import { ConflictError, NotFoundError } from '../../shared/errors';
import type { PlatformClient } from '../platform/client';
import { PlatformFetchError } from '../platform/errors';
import type { ProjectRecord } from '../projects/types';
import type { DashboardSession } from '../session/session';
import { extractQuestions, failedExtraction, toJsonDefinition, toXmlDefinition } from './extractor';
import type { AnalysedForm, ExtractionResult, FormAnalysisSummary, FormDefinition } from './types';

/** JSON content from the asset detail when it has a survey, else the deployed XForm. */
export async function fetchFormDefinition(client: PlatformClient, uid: string): Promise<FormDefinition | null> {
  const detail = await client.getAssetDetail(uid);
  const json = toJsonDefinition(detail.content);
  if (json) {
    return json;
  }
  logger.debug({ assetUid: uid }, 'no JSON form content, falling back to XForm');
  return toXmlDefinition(await client.getAssetXForm(uid));
}

async function analyseProject(client: PlatformClient, project: ProjectRecord): Promise<AnalysedForm> {
  let extraction: ExtractionResult;
  try {
    extraction = extractQuestions(await fetchFormDefinition(client, project.uid));
  } catch (error) {
    if (!(error instanceof PlatformFetchError)) {
      throw error;
    }
    extraction = failedExtraction(error.message);
  }

  if (extraction.parseFailed) {
    logger.warn({ error: extraction.error }, 'form could not be parsed');
  }

  return {
    uid: project.uid,
    formName: project.name,
    owner: project.ownerUsername,
    extraction,
  };
}

/**
 * Fetches and extracts the form of every project, in order. One form failing never stops
 * the others; it is recorded as a parse failure.
 */
export async function analyseForms(client: PlatformClient, projects: readonly ProjectRecord[]): Promise<AnalysedForm[]> {
  const forms: AnalysedForm[] = [];
  for (const project of projects) {
    forms.push(await runWithLogContext({ asset_uid: project.uid }, () => analyseProject(client, project)));
  }
  return forms;
}

/** Distinct names, label texts and types across all forms. */
export function countUniqueTerms(forms: readonly AnalysedForm[]): number {
  const terms = new Set<string>();
  for (const form of forms) {
    for (const question of form.extraction.questions) {
      terms.add(question.name);
      terms.add(question.type);
      for (const label of Object.values(question.labels)) {
        terms.add(label);
      }
    }
  }
  return terms.size;
}

export function summariseForm(form: AnalysedForm): FormAnalysisSummary {
  return {
    uid: form.uid,
    formName: form.formName,
    owner: form.owner,
    source: form.extraction.source,
    questionCount: form.extraction.questions.length,
    parseFailed: form.extraction.parseFailed,
    error: form.extraction.error,
  };
}

export function describeForms(session: DashboardSession) {
  const forms = session.forms;
  return {
    data: forms.map(summariseForm),
    totalForms: forms.length,
    failedForms: forms.filter((form) => form.extraction.parseFailed).length,
    uniqueTerms: countUniqueTerms(forms),
    analysedAt: session.formsAnalysedAt,
  };
}

/** Analyses the currently displayed projects and stores the result in the session. */
export async function analyseSessionForms(session: DashboardSession) {
  if (!session.projects.isLoaded) {
    throw new ConflictError('Load projects before analysing forms');
  }

  const ticket = session.beginAnalysis();
  const projects = session.displayedProjects;
  const forms = await analyseForms(session.client, projects);

  if (!session.commitForms(ticket, forms)) {
    throw new ConflictError('Form analysis was superseded by a newer request');
  }

  logger.info({ forms: forms.length }, 'forms analysed');
  return describeForms(session);
}

export function getFormQuestions(session: DashboardSession, uid: string) {
  const form = session.forms.find((candidate) => candidate.uid === uid);
  if (!form) {
    throw new NotFoundError(`Form ${uid} has not been analysed`);
  }
  return { ...summariseForm(form), questions: form.extraction.questions };
}
