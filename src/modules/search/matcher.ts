import { WRatio, partial_ratio, ratio, token_set_ratio, token_sort_ratio } from 'fuzzball';

import type { QuestionRecord } from '../forms/types';

export const MATCH_METHODS = [
  'ratio',
  'partial_ratio',
  'token_sort_ratio',
  'token_set_ratio',
  'weighted_ratio',
] as const;

export type MatchMethod = (typeof MATCH_METHODS)[number];

type Scorer = (keyword: string, candidate: string) => number;

export type MatchStrategy = {
  label: string;
  description: string;
  score: Scorer;
};

// Lower-cases, turns non-alphanumerics into spaces and trims before scoring.
const options = { full_process: true };

export const MATCH_STRATEGIES: Readonly<Record<MatchMethod, MatchStrategy>> = {
  ratio: {
    label: 'Simple ratio',
    description: 'Overall edit-distance similarity; order and length differences lower the score.',
    score: (keyword, candidate) => ratio(keyword, candidate, options),
  },
  partial_ratio: {
    label: 'Partial ratio',
    description: 'Best-aligned substring; rewards candidates that contain the keyword.',
    score: (keyword, candidate) => partial_ratio(keyword, candidate, options),
  },
  token_sort_ratio: {
    label: 'Token sort ratio',
    description: 'Sorts words alphabetically before comparing, so word order does not matter.',
    score: (keyword, candidate) => token_sort_ratio(keyword, candidate, options),
  },
  token_set_ratio: {
    label: 'Token set ratio',
    description: 'Compares shared and remaining word sets; robust to extra or repeated words. Recommended.',
    score: (keyword, candidate) => token_set_ratio(keyword, candidate, options),
  },
  weighted_ratio: {
    label: 'Weighted ratio',
    description: 'Length-weighted best of the other methods.',
    score: (keyword, candidate) => WRatio(keyword, candidate, options),
  },
};

export function isMatchMethod(value: string): value is MatchMethod {
  return (MATCH_METHODS as readonly string[]).includes(value);
}

/** Similarity of `candidate` to `keyword`, an integer in [0, 100]. */
export function score(method: MatchMethod, keyword: string, candidate: string): number {
  const raw = MATCH_STRATEGIES[method].score(keyword, candidate);
  return Math.min(100, Math.max(0, Math.round(raw)));
}

export function isMatch(value: number, threshold: number): boolean {
  return value >= threshold;
}

export type QuestionField = 'name' | 'label' | 'type';

export type FieldMatch = {
  field: QuestionField;
  language: string | null;
  value: string;
  score: number;
};

type Candidate = Omit<FieldMatch, 'score'>;

export function questionFields(question: QuestionRecord): Candidate[] {
  return [
    { field: 'name', language: null, value: question.name },
    ...Object.entries(question.labels).map(([language, value]): Candidate => ({ field: 'label', language, value })),
    { field: 'type', language: null, value: question.type },
  ];
}

/**
 * Scores every field of the question independently and returns the best one at or above
 * the threshold. Ties keep the earlier field: name, then labels, then type.
 */
export function matchQuestion(
  method: MatchMethod,
  keyword: string,
  question: QuestionRecord,
  threshold: number,
): FieldMatch | null {
  let best: FieldMatch | null = null;

  for (const candidate of questionFields(question)) {
    const value = score(method, keyword, candidate.value);
    if (!isMatch(value, threshold)) {
      continue;
    }
    if (!best || value > best.score) {
      best = { ...candidate, score: value };
    }
  }

  return best;
}

/** Splits comma-separated input, trims and lower-cases, dropping empty and repeated keywords. */
export function parseKeywords(input: string | readonly string[]): string[] {
  const parts = typeof input === 'string' ? input.split(',') : input.flatMap((entry) => entry.split(','));
  const keywords: string[] = [];
  for (const part of parts) {
    const keyword = part.trim().toLowerCase();
    if (keyword && !keywords.includes(keyword)) {
      keywords.push(keyword);
    }
  }
  return keywords;
}
