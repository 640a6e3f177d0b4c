import { Readable } from 'node:stream';

import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';

import { PlatformClient } from '../src/modules/platform/client';
import {
  NOTES_FILE,
  exportFormDefinitions,
  exportProjectMetadata,
  exportSubmissionsJson,
  exportSubmissionsWorkbook,
} from '../src/modules/exports/service';
import { buildProject } from './helpers/projects';
import { fakePlatform, page } from './helpers/fake-platform';

const { fetchFn } = fakePlatform({
  '/api/v2/assets/aWater.xls': () => new Response(Buffer.from('xls-bytes'), { status: 200 }),
  '/api/v2/assets/aWater/data/?format=json': page([
    { _id: 1, village: 'Kiambu', location: { lat: -1.17 } },
    { _id: 2, village: 'Thika', tags: ['urgent'] },
  ]),
  '/api/v2/assets/aCrops/data/?format=json': page([]),
});

const client = new PlatformClient({
  serverUrl: 'https://survey.example.org',
  apiToken: 'test-token',
  timeoutMs: 1000,
  fetchFn,
});

const projects = [
  buildProject({
    uid: 'aWater',
    name: 'Water: point/survey',
    countryLabel: 'Kenya',
    submissionCount: 2,
    dateCreated: new Date('2024-02-01T00:00:00Z'),
  }),
  buildProject({ uid: 'aCrops', name: 'Crop monitoring' }),
];

async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.read(Readable.from([buffer]));
  return workbook;
}

describe('exports', () => {
  it('writes one metadata row per project', async () => {
    const file = await exportProjectMetadata(projects);
    const sheet = (await loadWorkbook(file.buffer)).getWorksheet('Projects');

    expect(file.filename).toMatch(/^project-metadata-\d{4}-\d{2}-\d{2}\.xlsx$/);
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(1).value).toBe('UID');
    expect(sheet?.getRow(2).getCell(2).value).toBe('Water: point/survey');
    expect(sheet?.getRow(2).getCell(7).value).toBe('Kenya');
  });

  it('archives form definitions and notes the projects it skipped', async () => {
    const file = await exportFormDefinitions(client, projects);
    const zip = await JSZip.loadAsync(file.buffer);

    expect(Object.keys(zip.files).sort()).toEqual(['Water_ point_survey_aWater.xls', NOTES_FILE].sort());
    await expect(zip.file('Water_ point_survey_aWater.xls')?.async('string')).resolves.toBe('xls-bytes');
    expect(file.skipped).toEqual([
      {
        uid: 'aCrops',
        name: 'Crop monitoring',
        reason: 'Request to /api/v2/assets/aCrops.xls for asset aCrops failed with status 404',
      },
    ]);

    const notes = JSON.parse((await zip.file(NOTES_FILE)?.async('string')) ?? '{}');
    expect(notes.skipped).toEqual(file.skipped);
  });

  it('writes flattened submissions as JSON files', async () => {
    const file = await exportSubmissionsJson(client, projects);
    const zip = await JSZip.loadAsync(file.buffer);
    const content = await zip.file('Water_ point_survey_aWater_submissions.json')?.async('string');

    expect(JSON.parse(content ?? '[]')).toEqual([
      { _id: 1, village: 'Kiambu', 'location.lat': -1.17 },
      { _id: 2, village: 'Thika', tags: '["urgent"]' },
    ]);
    expect(file.skipped).toEqual([{ uid: 'aCrops', name: 'Crop monitoring', reason: 'No submissions' }]);
  });

  it('writes one sheet per form plus a notes sheet', async () => {
    const file = await exportSubmissionsWorkbook(client, projects);
    const workbook = await loadWorkbook(file.buffer);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Water_ point_survey', 'Notes']);

    const sheet = workbook.getWorksheet('Water_ point_survey');
    expect(sheet?.getRow(1).values).toEqual([undefined, '_id', 'village', 'location.lat', 'tags']);
    expect(sheet?.getRow(3).getCell(4).value).toBe('["urgent"]');

    const notes = workbook.getWorksheet('Notes');
    expect(notes?.getRow(2).getCell(1).value).toBe('aCrops');
    expect(notes?.getRow(2).getCell(3).value).toBe('No submissions');
  });

  it('names sheets after projects whose cut-off name ends in an apostrophe', async () => {
    const project = buildProject({ uid: 'aWater', name: "Nutrition survey in the farmer's homes" });
    const file = await exportSubmissionsWorkbook(client, [project]);
    const workbook = await loadWorkbook(file.buffer);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(['Nutrition survey in the farmer']);
    expect(file.skipped).toEqual([]);
  });
});
