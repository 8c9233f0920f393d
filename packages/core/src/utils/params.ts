// Parameter helpers - narrowing for the loosely-typed provider parameter map

import type { JobParameters, ParamValue } from '../types/connector.js';

export function isParamValue(value: unknown): value is ParamValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) ? value.every(isParamValue) : isParamObject(value);
    default:
      return false;
  }
}

export function isParamObject(value: unknown): value is JobParameters {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isParamValue);
}

export function readString(params: JobParameters, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

export function hasValue(params: JobParameters, key: string): boolean {
  const value = params[key];
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return true;
}

/** Parse a JSON string into a parameter map; anything else yields null. */
export function parseParamObject(raw: string | undefined): JobParameters | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isParamObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
