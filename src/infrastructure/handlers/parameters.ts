import type { ActionParameters } from '../../domain/index.js';

/** Reads a string parameter; anything else reads as absent. */
export function stringParam(params: ActionParameters, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

/** Reads a list of strings; `undefined` unless every entry is a string. */
export function stringListParam(params: ActionParameters, key: string): string[] | undefined {
  const value = params[key];
  if (!Array.isArray(value)) return undefined;

  const strings = value.filter((entry): entry is string => typeof entry === 'string');
  return strings.length === value.length ? strings : undefined;
}

export function recordParam(params: ActionParameters, key: string): Record<string, unknown> | undefined {
  const value = params[key];
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

export function requireParam(params: ActionParameters, key: string): void {
  if (!(key in params)) {
    throw new Error(`${key} parameter is required`);
  }
}
