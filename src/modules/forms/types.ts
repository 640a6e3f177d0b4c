export const UNKNOWN_TYPE = 'unknown';
export const DEFAULT_LANGUAGE = 'default';

export type QuestionRecord = {
  /** Unique within its form; the first occurrence wins. */
  name: string;
  /** Language name to label text, in the form's translation order. May be empty. */
  labels: Record<string, string>;
  type: string;
};

export type JsonFormContent = {
  survey: unknown[];
  translations: unknown[];
};

export type FormDefinition =
  | { kind: 'json'; content: JsonFormContent }
  | { kind: 'xml'; xml: string };

export type FormSourceKind = FormDefinition['kind'];

export type ExtractionResult = {
  questions: QuestionRecord[];
  source: FormSourceKind | null;
  parseFailed: boolean;
  error: string | null;
};

export type AnalysedForm = {
  uid: string;
  formName: string;
  owner: string | null;
  extraction: ExtractionResult;
};

export type FormAnalysisSummary = {
  uid: string;
  formName: string;
  owner: string | null;
  source: FormSourceKind | null;
  questionCount: number;
  parseFailed: boolean;
  error: string | null;
};
