import { QuestionCollector } from './collector';
import { DEFAULT_LANGUAGE, type JsonFormContent, type QuestionRecord } from './types';

const CONTAINER_TYPES = new Set(['group', 'repeat', 'survey']);

// Rows that never hold an answer column.
const EXCLUDED_TYPES = new Set([
  'note',
  'start',
  'end',
  'today',
  'deviceid',
  'subscriberid',
  'simserial',
  'phonenumber',
  'username',
  'audit',
  'start-geopoint',
  'background-audio',
]);

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** `select_one yes_no` and `select_one` both normalise to `select_one`. */
export function normaliseType(raw: unknown): string | null {
  const text = asText(raw);
  if (!text) {
    return null;
  }
  return text.split(/\s+/)[0].toLowerCase();
}

function isMarker(type: string): boolean {
  return /^(begin|end)([_ ]|$)/.test(type);
}

function languageName(translations: unknown[], index: number): string {
  return asText(translations[index]) ?? DEFAULT_LANGUAGE;
}

export function extractLabels(label: unknown, translations: unknown[]): Record<string, string> {
  const labels: Record<string, string> = {};

  if (typeof label === 'string') {
    const text = asText(label);
    if (text) {
      labels[DEFAULT_LANGUAGE] = text;
    }
    return labels;
  }

  if (Array.isArray(label)) {
    label.forEach((entry, index) => {
      const text = asText(entry);
      const language = languageName(translations, index);
      // several unnamed translations share `default`; the first one wins
      if (text && !(language in labels)) {
        labels[language] = text;
      }
    });
    return labels;
  }

  if (isRow(label)) {
    for (const [language, entry] of Object.entries(label)) {
      const text = asText(entry);
      if (text) {
        labels[language] = text;
      }
    }
  }

  return labels;
}

function walk(rows: unknown[], translations: unknown[], collector: QuestionCollector): void {
  for (const row of rows) {
    if (Array.isArray(row)) {
      walk(row, translations, collector);
      continue;
    }
    if (!isRow(row)) {
      continue;
    }

    const type = normaliseType(row.type);

    if (type && CONTAINER_TYPES.has(type)) {
      if (Array.isArray(row.children)) {
        walk(row.children, translations, collector);
      }
      continue;
    }

    if (type && (isMarker(type) || EXCLUDED_TYPES.has(type))) {
      continue;
    }

    const name = asText(row.name) ?? asText(row.$autoname);
    if (!name) {
      continue;
    }

    collector.add(name, extractLabels(row.label, translations), type);
  }
}

/**
 * Flattens a JSON form definition into its answerable questions. Accepts both the flat row
 * list with begin/end markers and the nested `children` tree.
 */
export function extractJsonQuestions(content: JsonFormContent): QuestionRecord[] {
  const collector = new QuestionCollector();
  walk(content.survey, content.translations, collector);
  return collector.toArray();
}
