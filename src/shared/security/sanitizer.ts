const DANGEROUS_PATTERN = /<\s*(script|iframe|object|embed)[^>]*>/gi;

function sanitizeString(value: string): string {
  return value.replace(DANGEROUS_PATTERN, '').replace(/javascript:/gi, '');
}

/** Strips markup that could be echoed back into the dashboard from keywords, names and filters. */
export function sanitizeInput(input: unknown): unknown {
  if (typeof input === 'string') {
    return sanitizeString(input);
  }

  if (Array.isArray(input)) {
    return input.map((value) => sanitizeInput(value));
  }

  if (typeof input === 'object' && input !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      result[key] = sanitizeInput(value);
    }
    return result;
  }

  return input;
}
