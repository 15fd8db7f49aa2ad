import path from 'node:path';

export const fixturesDirectory = path.join(__dirname, 'fixtures');

export const MINIMAL_INDEX = [
  'Package: foo',
  'Depends: bar (>= 1.0), baz',
  'Package: bar',
  'Depends: baz:any',
  'Package: baz',
].join('\n');

/**
 * Converts a relation or graph into a plain object with sorted values so
 * that assertions do not depend on set insertion order.
 */
export function toPlain(
  graph: ReadonlyMap<string, ReadonlySet<string>>,
): Record<string, string[]> {
  return Object.fromEntries(
    [...graph.entries()].map(([name, dependencies]) => [
      name,
      [...dependencies].sort(),
    ]),
  );
}

export function relationOf(
  entries: Record<string, string[]>,
): Map<string, Set<string>> {
  return new Map(
    Object.entries(entries).map(([name, dependencies]) => [
      name,
      new Set(dependencies),
    ]),
  );
}
