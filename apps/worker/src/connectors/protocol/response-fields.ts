// Helpers for reading provider JSON responses of unknown shape

export function getPath(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

export function getString(value: unknown, ...path: string[]): string | undefined {
  const found = getPath(value, ...path);
  return typeof found === 'string' && found.length > 0 ? found : undefined;
}

export function getArray(value: unknown, ...path: string[]): unknown[] {
  const found = getPath(value, ...path);
  return Array.isArray(found) ? found : [];
}

export function truncateForLog(value: unknown, maxLength = 500): string {
  let text: string;
  try {
    text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...[truncated]` : text;
}
