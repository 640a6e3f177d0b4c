import { describe, expect, it } from 'vitest';

import { collectColumns, flattenRecord } from '../../src/modules/exports/flatten';
import { projectFileStem, sanitizeName, uniqueSheetName } from '../../src/modules/exports/naming';

describe('sanitizeName', () => {
  it('replaces characters that are unsafe in file names', () => {
    expect(sanitizeName('Q1/Q2 survey: "north" <v2>|final?*\\')).toBe('Q1_Q2 survey_ _north_ _v2__final___');
    expect(projectFileStem('Baseline 2024/25', 'aB12')).toBe('Baseline 2024_25_aB12');
  });
});

describe('uniqueSheetName', () => {
  it('cuts names to 31 characters and keeps them unique', () => {
    const used = new Set<string>();
    const long = 'Household survey for the northern districts';

    expect(uniqueSheetName(long, used)).toBe('Household survey for the northe');
    expect(uniqueSheetName(long, used)).toBe('Household survey for the nort_2');
    expect(uniqueSheetName('HOUSEHOLD SURVEY FOR THE NORTHERN', used)).toBe('HOUSEHOLD SURVEY FOR THE NORT_3');
  });

  it('removes brackets and falls back for empty names', () => {
    const used = new Set<string>();
    expect(uniqueSheetName('[Pilot] form', used)).toBe('_Pilot_ form');
    expect(uniqueSheetName('', used)).toBe('Sheet');
  });

  it('never starts or ends a sheet name with an apostrophe', () => {
    const used = new Set<string>();
    const name = "Nutrition survey in the farmer's homes";

    expect(uniqueSheetName(name, used)).toBe('Nutrition survey in the farmer');
    expect(uniqueSheetName(name, used)).toBe('Nutrition survey in the farme_2');
    expect(uniqueSheetName(" 'Pilot' form", used)).toBe("Pilot' form");
    expect(uniqueSheetName("'''", used)).toBe('Sheet');
  });
});

describe('flattenRecord', () => {
  it('joins nested keys with dots and serialises arrays', () => {
    expect(
      flattenRecord({
        _id: 7,
        'group/age': '34',
        location: { village: 'Kiambu', gps: { lat: -1.17, lon: 36.83 } },
        _attachments: [{ filename: 'photo.jpg' }],
        _validation_status: {},
        _notes: null,
        consent: true,
      }),
    ).toEqual({
      _id: 7,
      'group/age': '34',
      'location.village': 'Kiambu',
      'location.gps.lat': -1.17,
      'location.gps.lon': 36.83,
      _attachments: '[{"filename":"photo.jpg"}]',
      _notes: null,
      consent: true,
    });
  });

  it('collects columns in first-seen order', () => {
    expect(collectColumns([{ a: 1, b: 2 }, { c: 3, a: 4 }])).toEqual(['a', 'b', 'c']);
  });
});
