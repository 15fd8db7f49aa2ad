import { INDEX_FIELDS } from './constants.js';
import { ParseError } from './errors.js';
import type { PackageRelation } from './interfaces.js';

const VERSION_CLAUSE_REGEX = /\([^)]*\)/g;
const SEPARATOR_REGEX = /[,|]/g;

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function dependencyField(line: string): string | undefined {
  return INDEX_FIELDS.DEPENDS.find((field) => line.startsWith(field));
}

/**
 * Extracts the bare dependency names from the value of a Depends or
 * Pre-Depends field. Version clauses, the `:any` qualifier and the
 * difference between alternatives and plain entries are all dropped.
 */
export function extractDependencyNames(value: string): string[] {
  return value
    .replace(VERSION_CLAUSE_REGEX, ' ')
    .replaceAll(INDEX_FIELDS.ANY_ARCH_QUALIFIER, '')
    .replace(SEPARATOR_REGEX, ' ')
    .split(/\s+/)
    .filter((name) => name.length > 0);
}

export function parsePackages(text: string): PackageRelation {
  const relation = new Map<string, Set<string>>();
  let active: Set<string> | null = null;

  for (const [index, line] of splitLines(text).entries()) {
    if (line.startsWith(INDEX_FIELDS.PACKAGE)) {
      const [, name] = line.trim().split(/\s+/);
      if (!name) {
        throw new ParseError('Package field without a name', index + 1);
      }
      // A repeated name starts over instead of merging.
      active = new Set<string>();
      relation.set(name, active);
      continue;
    }

    const field = dependencyField(line);
    if (field === undefined) continue;

    if (!active) {
      throw new ParseError(
        `${field.slice(0, -1)} field before any Package field`,
        index + 1,
      );
    }
    for (const name of extractDependencyNames(line.slice(field.length))) {
      active.add(name);
    }
  }

  return relation;
}

/**
 * Parses the compact `NAME: DEP DEP` format used for hand-written test
 * repositories. Blank lines and `#` comments are skipped.
 */
export function parseTestRepository(text: string): PackageRelation {
  const relation = new Map<string, Set<string>>();

  for (const [index, rawLine] of splitLines(text).entries()) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new ParseError(
        `Expected 'NAME: DEPENDENCIES', got '${line}'`,
        index + 1,
      );
    }
    const name = line.slice(0, colon).trim();
    if (name === '' || /\s/.test(name)) {
      throw new ParseError(`Invalid package name '${name}'`, index + 1);
    }

    const dependencies = line
      .slice(colon + 1)
      .split(/[\s,]+/)
      .filter((dep) => dep.length > 0);
    relation.set(name, new Set(dependencies));
  }

  return relation;
}
