import { extractQuestions } from '../forms/extractor';
import type { AnalysedForm, FormDefinition } from '../forms/types';
import { matchQuestion, type MatchMethod, type QuestionField } from './matcher';

export type SearchParams = {
  keywords: string[];
  method: MatchMethod;
  threshold: number;
};

export type KeywordMatch = {
  keyword: string;
  question: string;
  field: QuestionField;
  language: string | null;
  value: string;
  score: number;
};

export type MatchResult = {
  formName: string;
  uid: string;
  owner: string | null;
  /** Keywords with at least one matching field in the form. */
  matchCount: number;
  matches: KeywordMatch[];
  matchedTerms: string[];
  parseFailed: boolean;
  error: string | null;
};

export type ResultOrder = 'input' | 'matchCount' | 'formName';

export function searchForm(form: AnalysedForm, params: SearchParams): MatchResult {
  const { questions, parseFailed, error } = form.extraction;
  const matches: KeywordMatch[] = [];
  let matchCount = 0;

  for (const keyword of params.keywords) {
    const hits: Array<KeywordMatch & { order: number }> = [];

    questions.forEach((question, order) => {
      const best = matchQuestion(params.method, keyword, question, params.threshold);
      if (best) {
        hits.push({ keyword, question: question.name, ...best, order });
      }
    });

    if (hits.length === 0) {
      continue;
    }

    matchCount += 1;
    hits.sort((a, b) => b.score - a.score || a.order - b.order);
    matches.push(...hits.map(({ order: _order, ...hit }) => hit));
  }

  const matchedTerms = Array.from(new Set(matches.map((match) => match.value))).sort((a, b) => a.localeCompare(b));

  return {
    formName: form.formName,
    uid: form.uid,
    owner: form.owner,
    matchCount,
    matches,
    matchedTerms,
    parseFailed,
    error,
  };
}

/** One result per form, in input order. A failed form yields zero matches, never an exception. */
export function searchForms(forms: readonly AnalysedForm[], params: SearchParams): MatchResult[] {
  return forms.map((form) => searchForm(form, params));
}

export type FormDefinitionEntry = {
  uid: string;
  formName: string;
  owner?: string | null;
  definition: FormDefinition | null;
};

/** Extracts each definition once, then searches it. */
export function searchFormDefinitions(entries: readonly FormDefinitionEntry[], params: SearchParams): MatchResult[] {
  return searchForms(
    entries.map((entry) => ({
      uid: entry.uid,
      formName: entry.formName,
      owner: entry.owner ?? null,
      extraction: extractQuestions(entry.definition),
    })),
    params,
  );
}

export function orderResults(results: readonly MatchResult[], order: ResultOrder): MatchResult[] {
  const copy = [...results];
  if (order === 'matchCount') {
    return copy.sort((a, b) => b.matchCount - a.matchCount);
  }
  if (order === 'formName') {
    return copy.sort((a, b) => a.formName.localeCompare(b.formName));
  }
  return copy;
}
