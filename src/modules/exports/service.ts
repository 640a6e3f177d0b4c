import ExcelJS from 'exceljs';
import JSZip from 'jszip';

import { logger } from '../../config/logger';
import { runWithLogContext } from '../../observability/log-context';
import type { PlatformClient } from '../platform/client';
import { PlatformFetchError } from '../platform/errors';
import type { ProjectRecord } from '../projects/types';
import { collectColumns, flattenRecord, type FlatRecord } from './flatten';
import { projectFileStem, uniqueSheetName } from './naming';

export const EXPORT_KINDS = [
  'project-metadata',
  'form-definitions',
  'submissions-json',
  'submissions-workbook',
] as const;

export type ExportKind = (typeof EXPORT_KINDS)[number];

export type ExportNote = {
  uid: string;
  name: string;
  reason: string;
};

export type ExportFile = {
  filename: string;
  contentType: string;
  buffer: Buffer;
  skipped: ExportNote[];
};

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const ZIP_CONTENT_TYPE = 'application/zip';
export const NOTES_FILE = 'export-notes.json';
export const NOTES_SHEET = 'Notes';

const PROJECT_COLUMNS: Array<{ header: string; key: keyof ProjectRecord; width: number }> = [
  { header: 'UID', key: 'uid', width: 26 },
  { header: 'Name', key: 'name', width: 40 },
  { header: 'Status', key: 'status', width: 12 },
  { header: 'Submissions', key: 'submissionCount', width: 14 },
  { header: 'Date created', key: 'dateCreated', width: 22 },
  { header: 'Date modified', key: 'dateModified', width: 22 },
  { header: 'Country', key: 'countryLabel', width: 24 },
  { header: 'Country code', key: 'countryCode', width: 14 },
  { header: 'Sector', key: 'sector', width: 30 },
  { header: 'Owner', key: 'ownerUsername', width: 20 },
  { header: 'Source view UID', key: 'sourceViewUid', width: 26 },
  { header: 'Source view', key: 'sourceViewName', width: 30 },
  { header: 'Deployed', key: 'isDeployed', width: 10 },
  { header: 'Archived', key: 'isArchived', width: 10 },
];

function dateStamp(now = new Date()): string {
  return now.toISOString().slice(0, 10);
}

async function writeWorkbook(workbook: ExcelJS.Workbook): Promise<Buffer> {
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

/**
 * Runs `task` for each project. A fetch failure, or a null result, skips that project with a
 * note instead of failing the export.
 */
async function collectPerProject<T>(
  projects: readonly ProjectRecord[],
  task: (project: ProjectRecord) => Promise<T | null>,
  emptyReason: string,
): Promise<{ entries: Array<{ project: ProjectRecord; value: T }>; skipped: ExportNote[] }> {
  const entries: Array<{ project: ProjectRecord; value: T }> = [];
  const skipped: ExportNote[] = [];

  for (const project of projects) {
    await runWithLogContext({ asset_uid: project.uid }, async () => {
      try {
        const value = await task(project);
        if (value === null) {
          skipped.push({ uid: project.uid, name: project.name, reason: emptyReason });
          logger.warn({ reason: emptyReason }, 'export skipped project');
          return;
        }
        entries.push({ project, value });
      } catch (error) {
        if (!(error instanceof PlatformFetchError)) {
          throw error;
        }
        skipped.push({ uid: project.uid, name: project.name, reason: error.message });
        logger.warn({ reason: error.message }, 'export skipped project');
      }
    });
  }

  return { entries, skipped };
}

export async function exportProjectMetadata(projects: readonly ProjectRecord[]): Promise<ExportFile> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const sheet = workbook.addWorksheet('Projects');
  sheet.columns = PROJECT_COLUMNS;
  for (const project of projects) {
    sheet.addRow(project);
  }

  return {
    filename: `project-metadata-${dateStamp()}.xlsx`,
    contentType: XLSX_CONTENT_TYPE,
    buffer: await writeWorkbook(workbook),
    skipped: [],
  };
}

async function writeArchive(zip: JSZip, skipped: readonly ExportNote[]): Promise<Buffer> {
  if (skipped.length > 0) {
    zip.file(NOTES_FILE, JSON.stringify({ skipped }, null, 2));
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}

export async function exportFormDefinitions(
  client: PlatformClient,
  projects: readonly ProjectRecord[],
): Promise<ExportFile> {
  const { entries, skipped } = await collectPerProject(
    projects,
    async (project) => {
      const xls = await client.getAssetXls(project.uid);
      return xls.length > 0 ? xls : null;
    },
    'Empty form definition',
  );

  const zip = new JSZip();
  for (const { project, value } of entries) {
    zip.file(`${projectFileStem(project.name, project.uid)}.xls`, value);
  }

  return {
    filename: `form-definitions-${dateStamp()}.zip`,
    contentType: ZIP_CONTENT_TYPE,
    buffer: await writeArchive(zip, skipped),
    skipped,
  };
}

async function fetchFlatSubmissions(client: PlatformClient, uid: string): Promise<FlatRecord[] | null> {
  const submissions = await client.listSubmissions(uid);
  return submissions.length > 0 ? submissions.map((submission) => flattenRecord(submission)) : null;
}

export async function exportSubmissionsJson(
  client: PlatformClient,
  projects: readonly ProjectRecord[],
): Promise<ExportFile> {
  const { entries, skipped } = await collectPerProject(
    projects,
    (project) => fetchFlatSubmissions(client, project.uid),
    'No submissions',
  );

  const zip = new JSZip();
  for (const { project, value } of entries) {
    zip.file(`${projectFileStem(project.name, project.uid)}_submissions.json`, JSON.stringify(value, null, 2));
  }

  return {
    filename: `submissions-${dateStamp()}.zip`,
    contentType: ZIP_CONTENT_TYPE,
    buffer: await writeArchive(zip, skipped),
    skipped,
  };
}

export async function exportSubmissionsWorkbook(
  client: PlatformClient,
  projects: readonly ProjectRecord[],
): Promise<ExportFile> {
  const { entries, skipped } = await collectPerProject(
    projects,
    (project) => fetchFlatSubmissions(client, project.uid),
    'No submissions',
  );

  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const usedNames = new Set<string>([NOTES_SHEET.toLowerCase()]);

  for (const { project, value } of entries) {
    const sheet = workbook.addWorksheet(uniqueSheetName(project.name, usedNames));
    sheet.columns = collectColumns(value).map((column) => ({ header: column, key: column, width: 20 }));
    for (const row of value) {
      sheet.addRow(row);
    }
  }

  if (skipped.length > 0) {
    const notes = workbook.addWorksheet(NOTES_SHEET);
    notes.columns = [
      { header: 'UID', key: 'uid', width: 26 },
      { header: 'Name', key: 'name', width: 40 },
      { header: 'Reason', key: 'reason', width: 60 },
    ];
    for (const note of skipped) {
      notes.addRow(note);
    }
  }

  return {
    filename: `submissions-${dateStamp()}.xlsx`,
    contentType: XLSX_CONTENT_TYPE,
    buffer: await writeWorkbook(workbook),
    skipped,
  };
}

export async function buildExport(
  kind: ExportKind,
  client: PlatformClient,
  projects: readonly ProjectRecord[],
): Promise<ExportFile> {
  switch (kind) {
    case 'project-metadata':
      return exportProjectMetadata(projects);
    case 'form-definitions':
      return exportFormDefinitions(client, projects);
    case 'submissions-json':
      return exportSubmissionsJson(client, projects);
    case 'submissions-workbook':
      return exportSubmissionsWorkbook(client, projects);
  }
}
