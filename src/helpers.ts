import type { DependencyGraph } from './interfaces.js';

// Custom sort function to handle scoped and prefixed names
export function customSort(a: string, b: string): number {
  const aNormalized = a.replace(/^@/, '');
  const bNormalized = b.replace(/^@/, '');
  return aNormalized.localeCompare(bNormalized, 'en', { sensitivity: 'base' });
}

export function sortedDependencies(
  graph: DependencyGraph,
  name: string,
): string[] {
  return [...(graph.get(name) ?? [])].sort(customSort);
}

export function logNewlines(count = 1): void {
  for (let index = 0; index < count; index++) {
    console.log();
  }
}
