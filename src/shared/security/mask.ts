const SENSITIVE_KEYS = new Set(['apitoken', 'api_token', 'password', 'authorization', 'secret']);

function maskValue(value: string): string {
  if (value.length <= 4) {
    return '*'.repeat(value.length);
  }

  const visible = value.slice(-4);
  return `${'*'.repeat(value.length - 4)}${visible}`;
}

/** Replaces credential fields anywhere in a JSON payload, keeping the last four characters. */
export function maskSensitiveData(payload: unknown): unknown {
  if (Array.isArray(payload)) {
    return payload.map((item) => maskSensitiveData(item));
  }

  if (typeof payload !== 'object' || payload === null) {
    return payload;
  }

  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(payload)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase()) && typeof value === 'string') {
      result[key] = maskValue(value);
    } else {
      result[key] = maskSensitiveData(value);
    }
  }

  return result;
}
