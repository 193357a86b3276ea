import type { GraphQLError, SourceLocation } from 'graphql';

/**
 * Sorts errors by their locations, then by their paths, then by their
 * messages. Errors without locations or paths sort first.
 */
export function sortErrors(
  errors: ReadonlyArray<GraphQLError>,
): Array<GraphQLError> {
  return [...errors].sort(compareErrors);
}

function compareErrors(a: GraphQLError, b: GraphQLError): number {
  return (
    compareLocations(a.locations ?? [], b.locations ?? []) ||
    comparePaths(a.path ?? [], b.path ?? []) ||
    compareStrings(a.message, b.message)
  );
}

function compareLocations(
  a: ReadonlyArray<SourceLocation>,
  b: ReadonlyArray<SourceLocation>,
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = a[i].line - b[i].line || a[i].column - b[i].column;
    if (result !== 0) {
      return result;
    }
  }
  return a.length - b.length;
}

function comparePaths(
  a: ReadonlyArray<string | number>,
  b: ReadonlyArray<string | number>,
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = comparePathKeys(a[i], b[i]);
    if (result !== 0) {
      return result;
    }
  }
  return a.length - b.length;
}

function comparePathKeys(a: string | number, b: string | number): number {
  if (typeof a === 'number') {
    return typeof b === 'number' ? a - b : -1;
  }
  return typeof b === 'number' ? 1 : compareStrings(a, b);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
