import chalk from 'chalk';
import CliTable from 'cli-table3';

import { customSort, sortedDependencies } from './helpers.js';
import type { AsciiTreeMode, DependencyGraph } from './interfaces.js';

const TREE = {
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  PIPE: '│   ',
  SPACE: '    ',
} as const;

interface NodeLabel {
  text: string;
  expand: boolean;
}

/**
 * Renders the graph as an indented tree rooted at `root`.
 *
 * `simple` expands every subtree in full. `detailed` appends the number of
 * included dependencies, marks names without a graph entry as `[leaf]` and
 * prints a repeated subtree only once, marking later occurrences with `(*)`.
 */
export function renderAsciiTree(
  graph: DependencyGraph,
  root: string,
  mode: Exclude<AsciiTreeMode, 'off'>,
): string {
  const detailed = mode === 'detailed';
  const printed = new Set<string>();
  const lines: string[] = [];

  const describe = (name: string, ancestors: Set<string>): NodeLabel => {
    if (ancestors.has(name)) {
      return { text: `${name} (cycle)`, expand: false };
    }
    if (detailed && printed.has(name)) {
      return { text: `${name} (*)`, expand: false };
    }
    const dependencies = graph.get(name);
    if (!dependencies) {
      return { text: detailed ? `${name} [leaf]` : name, expand: false };
    }
    printed.add(name);
    return {
      text: detailed ? `${name} (${dependencies.size})` : name,
      expand: true,
    };
  };

  const walk = (name: string, prefix: string, ancestors: Set<string>) => {
    const children = sortedDependencies(graph, name);
    for (const [index, child] of children.entries()) {
      const isLast = index === children.length - 1;
      const label = describe(child, ancestors);
      lines.push(
        `${prefix}${isLast ? TREE.LAST_BRANCH : TREE.BRANCH}${label.text}`,
      );
      if (label.expand) {
        ancestors.add(child);
        walk(child, `${prefix}${isLast ? TREE.SPACE : TREE.PIPE}`, ancestors);
        ancestors.delete(child);
      }
    }
  };

  const rootLabel = describe(root, new Set());
  lines.push(rootLabel.text);
  if (rootLabel.expand) {
    walk(root, '', new Set([root]));
  }
  return lines.join('\n');
}

/**
 * Renders the graph as a PlantUML work breakdown structure.
 */
export function renderWbs(graph: DependencyGraph, root: string): string {
  const lines = ['@startwbs'];

  const walk = (name: string, level: number, ancestors: Set<string>) => {
    lines.push(`${'*'.repeat(level)} ${name}`);
    if (ancestors.has(name)) return;
    ancestors.add(name);
    for (const child of sortedDependencies(graph, name)) {
      walk(child, level + 1, ancestors);
    }
    ancestors.delete(name);
  };

  walk(root, 1, new Set());
  lines.push('@endwbs');
  return lines.join('\n');
}

export function renderSummaryTable(graph: DependencyGraph): string {
  const table = new CliTable({
    head: ['Package', 'Dependencies', 'Count'],
    wordWrap: true,
    style: { head: ['cyan'], border: ['grey'] },
  });

  for (const name of [...graph.keys()].sort(customSort)) {
    const dependencies = sortedDependencies(graph, name);
    table.push([
      name,
      dependencies.length > 0 ? dependencies.join(', ') : chalk.gray('-'),
      String(dependencies.length),
    ]);
  }

  return table.toString();
}
