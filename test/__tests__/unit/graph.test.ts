import { readFileSync } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from '@jest/globals';

import { BuildError } from '../../../src/errors';
import { buildDependencyGraph, countEdges } from '../../../src/graph';
import { parsePackages } from '../../../src/parser';
import {
  MINIMAL_INDEX,
  fixturesDirectory,
  relationOf,
  toPlain,
} from '../../helpers';

const minimal = parsePackages(MINIMAL_INDEX);

describe('buildDependencyGraph', () => {
  it('should build the full graph within a generous depth', () => {
    expect.hasAssertions();

    expect(toPlain(buildDependencyGraph('foo', minimal, 5, ''))).toStrictEqual(
      {
        foo: ['bar', 'baz'],
        bar: ['baz'],
        baz: [],
      },
    );
  });

  it('should drop edges to children cut off by depth 1', () => {
    expect.hasAssertions();

    expect(toPlain(buildDependencyGraph('foo', minimal, 1, ''))).toStrictEqual(
      { foo: [] },
    );
  });

  it('should skip every dependency containing the filter', () => {
    expect.hasAssertions();

    expect(
      toPlain(buildDependencyGraph('foo', minimal, 5, 'ba')),
    ).toStrictEqual({ foo: [] });
  });

  it('should return an empty graph for depth 0', () => {
    expect.hasAssertions();

    expect(buildDependencyGraph('foo', minimal, 0, '').size).toBe(0);
  });

  it('should treat a negative depth like depth 0', () => {
    expect.hasAssertions();

    expect(buildDependencyGraph('foo', minimal, -3, '').size).toBe(0);
  });

  it('should reject a non-integer depth', () => {
    expect.hasAssertions();

    expect(() => buildDependencyGraph('foo', minimal, 1.5, '')).toThrow(
      BuildError,
    );
    expect(() => buildDependencyGraph('foo', minimal, Number.NaN)).toThrow(
      'maxDepth must be an integer, got NaN',
    );
  });

  it('should expand an unknown root as a package without dependencies', () => {
    expect.hasAssertions();

    expect(
      toPlain(buildDependencyGraph('ghost', minimal, 3, '')),
    ).toStrictEqual({ ghost: [] });
  });

  it('should keep an expanded but truncated node without its children', () => {
    expect.hasAssertions();

    const chain = relationOf({ a: ['b'], b: ['c'], c: ['d'], d: [] });

    expect(toPlain(buildDependencyGraph('a', chain, 2, ''))).toStrictEqual({
      a: ['b'],
      b: [],
    });
  });

  it('should link a node reached again through a shorter path', () => {
    expect.hasAssertions();

    const relation = relationOf({ a: ['b', 'c'], b: ['c'], c: [] });

    // c is cut off below b, then expanded directly from a.
    expect(toPlain(buildDependencyGraph('a', relation, 2, ''))).toStrictEqual({
      a: ['b', 'c'],
      b: [],
      c: [],
    });
  });

  it('should link an already finished node from a second parent', () => {
    expect.hasAssertions();

    const diamond = relationOf({ a: ['b', 'c'], b: ['d'], c: ['d'], d: [] });
    const graph = buildDependencyGraph('a', diamond, 5, '');

    expect(toPlain(graph)).toStrictEqual({
      a: ['b', 'c'],
      b: ['d'],
      c: ['d'],
      d: [],
    });
    expect([...graph.keys()]).toStrictEqual(['a', 'b', 'd', 'c']);
  });

  it('should drop the back edge of a two-node cycle', () => {
    expect.hasAssertions();

    const cycle = relationOf({ A: ['B'], B: ['A'] });

    expect(toPlain(buildDependencyGraph('A', cycle, 3, ''))).toStrictEqual({
      A: ['B'],
      B: [],
    });
  });

  it('should terminate on a cycle for every depth with at most depth keys', () => {
    expect.hasAssertions();

    const cycle = relationOf({ A: ['B'], B: ['A'] });

    for (let depth = 0; depth <= 8; depth++) {
      const graph = buildDependencyGraph('A', cycle, depth, '');

      expect(graph.size).toBeLessThanOrEqual(depth);
    }
  });

  it('should always drop self-dependencies', () => {
    expect.hasAssertions();

    const relation = relationOf({ a: ['a', 'b'], b: ['b'] });

    expect(toPlain(buildDependencyGraph('a', relation, 4, ''))).toStrictEqual({
      a: ['b'],
      b: [],
    });
  });

  it('should return identical graphs for identical calls', () => {
    expect.hasAssertions();

    const first = buildDependencyGraph('foo', minimal, 5, '');
    const second = buildDependencyGraph('foo', minimal, 5, '');

    expect(toPlain(second)).toStrictEqual(toPlain(first));
    expect(second).not.toBe(first);
  });

  it('should not mutate the relation', () => {
    expect.hasAssertions();

    const relation = relationOf({ a: ['a', 'b'], b: ['c'], c: ['a'] });
    const before = toPlain(relation);
    buildDependencyGraph('a', relation, 6, 'c');

    expect(toPlain(relation)).toStrictEqual(before);
  });

  describe('on the sample index', () => {
    const relation = parsePackages(
      readFileSync(path.join(fixturesDirectory, 'Packages'), 'utf8'),
    );

    it('should only grow the key set as depth increases', () => {
      expect.hasAssertions();

      for (let depth = 0; depth < 6; depth++) {
        const smaller = buildDependencyGraph('webapp', relation, depth, '');
        const larger = buildDependencyGraph('webapp', relation, depth + 1, '');

        for (const key of smaller.keys()) {
          expect(larger.has(key)).toBe(true);
        }
      }
    });

    it('should never expand or link a filtered name', () => {
      expect.hasAssertions();

      const graph = buildDependencyGraph('webapp', relation, 6, 'exim');
      const names = [
        ...graph.keys(),
        ...[...graph.values()].flatMap((dependencies) => [...dependencies]),
      ];

      expect(names.filter((name) => name.includes('exim'))).toStrictEqual([]);
    });

    it('should build the depth 2 graph', () => {
      expect.hasAssertions();

      expect(
        toPlain(buildDependencyGraph('webapp', relation, 2, '')),
      ).toStrictEqual({
        webapp: [
          'exim4',
          'init-system-helpers',
          'libc6',
          'libssl3',
          'mail-transport-agent',
          'python3',
        ],
        'init-system-helpers': [],
        libc6: [],
        libssl3: ['libc6'],
        python3: [],
        'mail-transport-agent': [],
        exim4: [],
      });
    });

    it('should build the depth 3 graph without exim packages', () => {
      expect.hasAssertions();

      const graph = buildDependencyGraph('webapp', relation, 3, 'exim');

      expect(toPlain(graph)).toStrictEqual({
        webapp: [
          'init-system-helpers',
          'libc6',
          'libssl3',
          'mail-transport-agent',
          'python3',
        ],
        'init-system-helpers': ['perl-base'],
        'perl-base': [],
        libc6: ['libgcc-s1'],
        'libgcc-s1': [],
        libssl3: ['libc6'],
        python3: ['libpython3-stdlib', 'python3-minimal'],
        'python3-minimal': ['libc6'],
        'libpython3-stdlib': [],
        'mail-transport-agent': [],
      });
      expect(countEdges(graph)).toBe(11);
    });
  });
});

describe('countEdges', () => {
  it('should count every included dependency', () => {
    expect.hasAssertions();

    expect(countEdges(buildDependencyGraph('foo', minimal, 5, ''))).toBe(3);
    expect(countEdges(new Map())).toBe(0);
  });
});
