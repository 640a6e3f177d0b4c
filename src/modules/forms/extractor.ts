import { extractJsonQuestions } from './json-extractor';
import { extractXFormQuestions } from './xform-extractor';
import type { ExtractionResult, FormDefinition, JsonFormContent } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves an asset's `content` into a JSON definition. Content that is absent, not a
 * JSON object (or JSON text of one), or has no object row in its `survey` list yields null.
 */
export function toJsonDefinition(content: unknown): FormDefinition | null {
  let candidate = content;
  if (typeof candidate === 'string') {
    try {
      candidate = JSON.parse(candidate);
    } catch {
      return null;
    }
  }

  if (!isRecord(candidate) || !Array.isArray(candidate.survey) || !candidate.survey.some(isRecord)) {
    return null;
  }

  const jsonContent: JsonFormContent = {
    survey: candidate.survey,
    translations: Array.isArray(candidate.translations) ? candidate.translations : [],
  };
  return { kind: 'json', content: jsonContent };
}

export function toXmlDefinition(xml: string | null | undefined): FormDefinition | null {
  if (typeof xml !== 'string' || xml.trim().length === 0) {
    return null;
  }
  return { kind: 'xml', xml };
}

/** JSON first, XForm second. */
export function resolveFormDefinition(sources: { content?: unknown; xml?: string | null }): FormDefinition | null {
  return toJsonDefinition(sources.content) ?? toXmlDefinition(sources.xml);
}

export function failedExtraction(error: string, source: FormDefinition['kind'] | null = null): ExtractionResult {
  return { questions: [], source, parseFailed: true, error };
}

/** Never throws: an unusable definition becomes an empty result flagged as failed. */
export function extractQuestions(definition: FormDefinition | null): ExtractionResult {
  if (!definition) {
    return failedExtraction('No usable JSON or XML form definition');
  }

  try {
    const questions =
      definition.kind === 'json' ? extractJsonQuestions(definition.content) : extractXFormQuestions(definition.xml);
    return { questions, source: definition.kind, parseFailed: false, error: null };
  } catch (error) {
    return failedExtraction(error instanceof Error ? error.message : String(error), definition.kind);
  }
}
