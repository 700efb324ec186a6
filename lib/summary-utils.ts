import { Scope } from './types';

/** Printed in summaries for a field that has no value. */
export const ABSENT = 'null';

export function formatValue(value: unknown): string {
  return value == null ? ABSENT : String(value);
}

/**
 * Space-separated scope names, in order. An empty list yields `''`,
 * a missing list yields {@link ABSENT}.
 */
export function listScopeNames(scopes: readonly Scope[] | null | undefined): string {
  if (scopes == null) return ABSENT;
  return scopes.map((scope) => formatValue(scope.name)).join(' ');
}

export function joinStrings(strings: readonly string[] | null | undefined): string {
  if (strings == null) return ABSENT;
  return strings.join(' ');
}
