/** Headers sent with every JSON request; adds a bearer token when one is configured. */
export function jsonHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  return headers;
}

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Parses a response body as JSON, returning the raw text when it is not JSON.
 */
export async function readBody(response: Response): Promise<{ text: string; json?: unknown }> {
  const text = await response.text();
  try {
    return { text, json: JSON.parse(text) };
  } catch {
    return { text };
  }
}

/**
 * Walks `keys` into a parsed JSON value and returns the string found there.
 */
export function readStringAt(value: unknown, keys: readonly string[]): string | undefined {
  let current: unknown = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return typeof current === 'string' ? current : undefined;
}

export function topLevelKeys(value: unknown): string[] {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.keys(value)
    : [];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
