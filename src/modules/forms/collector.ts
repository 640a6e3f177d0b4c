import { UNKNOWN_TYPE, type QuestionRecord } from './types';

/** Accumulates questions in document order, dropping repeated names. */
export class QuestionCollector {
  private readonly questions: QuestionRecord[] = [];
  private readonly names = new Set<string>();

  add(name: string, labels: Record<string, string>, type: string | null | undefined): boolean {
    const trimmed = name.trim();
    if (!trimmed || this.names.has(trimmed)) {
      return false;
    }

    this.names.add(trimmed);
    this.questions.push({
      name: trimmed,
      labels,
      type: type && type.trim() ? type.trim() : UNKNOWN_TYPE,
    });
    return true;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  toArray(): QuestionRecord[] {
    return [...this.questions];
  }
}
