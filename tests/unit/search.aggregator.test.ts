import { describe, expect, it } from 'vitest';

import {
  orderResults,
  searchFormDefinitions,
  searchForms,
  type SearchParams,
} from '../../src/modules/search/aggregator';
import { failedExtraction } from '../../src/modules/forms/extractor';
import type { AnalysedForm, QuestionRecord } from '../../src/modules/forms/types';

function form(uid: string, formName: string, questions: QuestionRecord[]): AnalysedForm {
  return {
    uid,
    formName,
    owner: 'field-team',
    extraction: { questions, source: 'json', parseFailed: false, error: null },
  };
}

const water = form('aWater', 'Water point survey', [
  { name: 'water_source', labels: { default: 'Main source of drinking water' }, type: 'select_one' },
  { name: 'water_distance', labels: { default: 'Distance to water point' }, type: 'decimal' },
  { name: 'respondent_age', labels: { default: 'Age' }, type: 'integer' },
]);

const crops = form('aCrops', 'Crop monitoring', [
  { name: 'crop_type', labels: { default: 'Main crop grown' }, type: 'select_one' },
]);

const broken: AnalysedForm = {
  uid: 'aBroken',
  formName: 'Broken form',
  owner: null,
  extraction: failedExtraction('Malformed XML at line 1: Unclosed tag', 'xml'),
};

const params = (keywords: string[], threshold = 80): SearchParams => ({
  keywords,
  method: 'token_set_ratio',
  threshold,
});

describe('searchForms', () => {
  it('returns one result per form in input order', () => {
    const results = searchForms([crops, water, broken], params(['water']));
    expect(results.map((result) => result.uid)).toEqual(['aCrops', 'aWater', 'aBroken']);
  });

  it('counts matched keywords and lists every matching question', () => {
    const [result] = searchForms([water], params(['water', 'age', 'latrine']));

    expect(result.matchCount).toBe(2);
    expect(result.matches.map((match) => [match.keyword, match.question])).toEqual([
      ['water', 'water_source'],
      ['water', 'water_distance'],
      ['age', 'respondent_age'],
    ]);
    expect(result.matches[0]).toMatchObject({ field: 'name', value: 'water_source', score: 100 });
    expect(result.matchedTerms).toEqual(['respondent_age', 'water_distance', 'water_source']);
  });

  it('reports a failed form with zero matches instead of throwing', () => {
    const [result] = searchForms([broken], params(['water']));

    expect(result).toEqual({
      formName: 'Broken form',
      uid: 'aBroken',
      owner: null,
      matchCount: 0,
      matches: [],
      matchedTerms: [],
      parseFailed: true,
      error: 'Malformed XML at line 1: Unclosed tag',
    });
  });

  it('never gains matches as the threshold rises', () => {
    const keywords = ['water', 'age', 'crop', 'distance', 'source'];
    let previous = Number.POSITIVE_INFINITY;

    for (let threshold = 0; threshold <= 100; threshold += 10) {
      const total = searchForms([water, crops], params(keywords, threshold)).reduce(
        (sum, result) => sum + result.matchCount,
        0,
      );
      expect(total).toBeLessThanOrEqual(previous);
      previous = total;
    }
  });
});

describe('searchFormDefinitions', () => {
  it('extracts each definition before searching', () => {
    const results = searchFormDefinitions(
      [
        {
          uid: 'aJson',
          formName: 'Household',
          definition: {
            kind: 'json',
            content: { survey: [{ type: 'integer', name: 'household_size', label: 'Household size' }], translations: [] },
          },
        },
        { uid: 'aNone', formName: 'Empty', definition: null },
      ],
      params(['size household']),
    );

    expect(results[0]).toMatchObject({ uid: 'aJson', owner: null, matchCount: 1, parseFailed: false });
    expect(results[1]).toMatchObject({ uid: 'aNone', matchCount: 0, parseFailed: true });
  });
});

describe('orderResults', () => {
  it('sorts by match count or form name without touching the input', () => {
    const results = searchForms([crops, water], params(['water']));

    expect(orderResults(results, 'matchCount').map((result) => result.uid)).toEqual(['aWater', 'aCrops']);
    expect(orderResults(results, 'formName').map((result) => result.uid)).toEqual(['aCrops', 'aWater']);
    expect(results.map((result) => result.uid)).toEqual(['aCrops', 'aWater']);
  });
});
