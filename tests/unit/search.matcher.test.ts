import { describe, expect, it } from 'vitest';

import {
  MATCH_METHODS,
  isMatch,
  isMatchMethod,
  matchQuestion,
  parseKeywords,
  score,
} from '../../src/modules/search/matcher';
import type { QuestionRecord } from '../../src/modules/forms/types';

const ageQuestion: QuestionRecord = {
  name: 'respondent_age',
  labels: { English: 'Age of respondent', French: 'Age du repondant' },
  type: 'integer',
};

describe('score', () => {
  it('matches a keyword contained in a longer name only with partial ratio', () => {
    const partial = score('partial_ratio', 'age', 'respondent_age');
    const simple = score('ratio', 'age', 'respondent_age');

    expect(partial).toBe(100);
    expect(isMatch(partial, 80)).toBe(true);
    expect(simple).toBeLessThan(95);
    expect(isMatch(simple, 95)).toBe(false);
  });

  it('ignores word order with the token methods', () => {
    expect(score('token_sort_ratio', 'size household', 'household size')).toBe(100);
    expect(score('token_set_ratio', 'household size', 'size of household')).toBe(100);
  });

  it('is symmetric for token set ratio', () => {
    const pairs: Array<[string, string]> = [
      ['water source', 'main source of drinking water'],
      ['crop', 'crops grown last season'],
      ['income', 'household monthly income'],
    ];

    for (const [a, b] of pairs) {
      expect(score('token_set_ratio', a, b)).toBe(score('token_set_ratio', b, a));
    }
  });

  it('always returns an integer between 0 and 100', () => {
    for (const method of MATCH_METHODS) {
      const value = score(method, 'latrine', 'Type of toilet facility');
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });
});

describe('isMatch', () => {
  it('includes the threshold itself', () => {
    expect(isMatch(80, 80)).toBe(true);
    expect(isMatch(79, 80)).toBe(false);
  });
});

describe('isMatchMethod', () => {
  it('accepts only the supported method names', () => {
    expect(isMatchMethod('token_set_ratio')).toBe(true);
    expect(isMatchMethod('weighted_ratio')).toBe(true);
    expect(isMatchMethod('soundex')).toBe(false);
  });
});

describe('matchQuestion', () => {
  it('keeps the earlier field when scores tie', () => {
    expect(matchQuestion('token_set_ratio', 'age', ageQuestion, 80)).toEqual({
      field: 'name',
      language: null,
      value: 'respondent_age',
      score: 100,
    });
  });

  it('can match on the question type', () => {
    expect(matchQuestion('ratio', 'integer', ageQuestion, 100)).toEqual({
      field: 'type',
      language: null,
      value: 'integer',
      score: 100,
    });
  });

  it('returns null when no field reaches the threshold', () => {
    expect(matchQuestion('ratio', 'latrine', ageQuestion, 90)).toBeNull();
  });
});

describe('parseKeywords', () => {
  it('trims, lower-cases and drops empty or repeated keywords', () => {
    expect(parseKeywords(' Age, water ,age,, ')).toEqual(['age', 'water']);
    expect(parseKeywords(['Income', 'crops, income'])).toEqual(['income', 'crops']);
  });
});
