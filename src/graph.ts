import { BuildError } from './errors.js';
import type { DependencyGraph, PackageRelation } from './interfaces.js';

interface Traversal {
  relation: PackageRelation;
  filter: string;
  graph: DependencyGraph;
  visited: Set<string>;
}

const NO_DEPENDENCIES: ReadonlySet<string> = new Set();

function isFiltered(dependency: string, filter: string): boolean {
  return filter !== '' && dependency.includes(filter);
}

function expand(state: Traversal, name: string, depth: number): void {
  if (depth <= 0) return;

  const included = new Set<string>();
  state.graph.set(name, included);

  for (const dep of state.relation.get(name) ?? NO_DEPENDENCIES) {
    if (isFiltered(dep, state.filter)) continue;
    if (!state.graph.has(dep)) {
      expand(state, dep, depth - 1);
    }
    // Only link dependencies whose own expansion finished. This drops
    // edges to depth-truncated nodes and to cycle members still on the path.
    if (state.visited.has(dep)) {
      included.add(dep);
    }
  }

  state.visited.add(name);
}

/**
 * Builds the dependency graph reachable from `root` within `maxDepth`
 * expansion levels, skipping every dependency whose name contains `filter`.
 *
 * Keys are the expanded packages. A depth of 0 (or less) yields an empty
 * graph, and a root missing from the relation is expanded as a package
 * without dependencies.
 */
export function buildDependencyGraph(
  root: string,
  relation: PackageRelation,
  maxDepth: number,
  filter = '',
): DependencyGraph {
  if (!Number.isInteger(maxDepth)) {
    throw new BuildError(`maxDepth must be an integer, got ${maxDepth}`);
  }

  const state: Traversal = {
    relation,
    filter,
    graph: new Map(),
    visited: new Set(),
  };
  expand(state, root, maxDepth);
  return state.graph;
}

export function countEdges(graph: DependencyGraph): number {
  let edges = 0;
  for (const dependencies of graph.values()) {
    edges += dependencies.size;
  }
  return edges;
}
