const UNSAFE_CHARACTERS = /[/\\:*?"<>|]/g;

export const MAX_SHEET_NAME_LENGTH = 31;

export function sanitizeName(name: string): string {
  return name.replace(UNSAFE_CHARACTERS, '_');
}

export function projectFileStem(name: string, uid: string): string {
  return `${sanitizeName(name)}_${uid}`;
}

function stripEdges(name: string): string {
  return name.replace(/^[\s']+|[\s']+$/g, '');
}

/**
 * Sheet names must be unique (case-insensitively), at most 31 characters, free of `[ ]` and
 * may not start or end with an apostrophe. Registers the returned name in `used`.
 */
export function uniqueSheetName(name: string, used: Set<string>): string {
  const base = stripEdges(sanitizeName(name).replace(/[[\]]/g, '_').trimStart().slice(0, MAX_SHEET_NAME_LENGTH)) || 'Sheet';

  let candidate = base;
  let counter = 2;
  while (used.has(candidate.toLowerCase())) {
    const suffix = `_${counter}`;
    const stem = stripEdges(base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length));
    candidate = `${stem || 'Sheet'}${suffix}`;
    counter += 1;
  }

  used.add(candidate.toLowerCase());
  return candidate;
}
