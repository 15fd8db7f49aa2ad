import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import path from 'node:path';

import { Command } from 'commander';

import {
  ASCII_TREE_MODES,
  CLI_STRINGS,
  DEFAULTS,
  MAX_DEPTH_LIMIT,
  SOURCE_PATTERNS,
  TEST_MODES,
} from './constants.js';
import { ConfigError } from './errors.js';
import type {
  AsciiTreeMode,
  CliConfig,
  CliOptions,
  TestMode,
} from './interfaces.js';

export async function readPackageVersion(): Promise<string> {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(
      await fs.readFile(packageJsonPath, 'utf8'),
    );
    if (
      packageJson &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(version: string): Command {
  const program = new Command();

  program.configureOutput({
    writeOut: (string_) => process.stdout.write(string_),
    writeErr: (string_) => process.stderr.write(string_),
  });
  program.exitOverride();

  program
    .name(CLI_STRINGS.CLI_NAME)
    .usage('-p <package> (--repo-url <url> | --repo-path <path>) [options]')
    .description(CLI_STRINGS.CLI_DESCRIPTION)

    .option('-p, --package <name>', 'package to analyze')
    .option('--repo-url <url>', 'URL of the Packages index (may be gzipped)')
    .option('--repo-path <path>', 'path to a local test repository file')
    .option(
      '--test-mode <mode>',
      `test repository mode (${TEST_MODES.join(', ')})`,
      DEFAULTS.TEST_MODE,
    )
    .option(
      '--ascii-tree <mode>',
      `print an ASCII tree (${ASCII_TREE_MODES.join(', ')})`,
      DEFAULTS.ASCII_TREE,
    )
    .option('--wbs', 'print the graph as a PlantUML WBS diagram')
    .option(
      '--max-depth <n>',
      'maximum dependency depth',
      String(DEFAULTS.MAX_DEPTH),
    )
    .option(
      '--filter <substr>',
      'skip dependencies whose name contains this substring',
      DEFAULTS.FILTER,
    )
    .option('-v, --verbose', 'print the configuration and a summary table')
    .version(version, '--version', 'display installed version')
    .addHelpText('after', CLI_STRINGS.EXAMPLE_TEXT);

  return program;
}

function isTestMode(value: string): value is TestMode {
  return TEST_MODES.some((mode) => mode === value);
}

function isAsciiTreeMode(value: string): value is AsciiTreeMode {
  return ASCII_TREE_MODES.some((mode) => mode === value);
}

export function isValidRepoUrl(url: string): boolean {
  return SOURCE_PATTERNS.REPO_URL_REGEX.test(url);
}

function parseMaxDepth(raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`--max-depth must be an integer, got '${raw}'`);
  }
  const depth = Number.parseInt(raw, 10);
  if (depth < 0) {
    throw new ConfigError('--max-depth must be an integer >= 0');
  }
  if (depth > MAX_DEPTH_LIMIT) {
    throw new ConfigError(`--max-depth must not exceed ${MAX_DEPTH_LIMIT}`);
  }
  return depth;
}

export function validateOptions(options: CliOptions): CliConfig {
  const packageName = options.package ?? '';
  if (packageName.trim() === '') {
    throw new ConfigError('--package is empty or contains only whitespace');
  }
  if (/\s/.test(packageName)) {
    throw new ConfigError('--package must not contain whitespace');
  }

  const { repoUrl, repoPath } = options;
  if (repoUrl === undefined && repoPath === undefined) {
    throw new ConfigError('one of --repo-url or --repo-path is required');
  }
  if (repoUrl !== undefined && repoPath !== undefined) {
    throw new ConfigError('--repo-url and --repo-path are mutually exclusive');
  }

  const testMode = options.testMode ?? DEFAULTS.TEST_MODE;
  if (!isTestMode(testMode)) {
    throw new ConfigError(
      `--test-mode must be one of ${TEST_MODES.join(', ')}, got '${testMode}'`,
    );
  }
  const asciiTree = options.asciiTree ?? DEFAULTS.ASCII_TREE;
  if (!isAsciiTreeMode(asciiTree)) {
    throw new ConfigError(
      `--ascii-tree must be one of ${ASCII_TREE_MODES.join(', ')}, got '${asciiTree}'`,
    );
  }

  if (repoUrl !== undefined) {
    if (!isValidRepoUrl(repoUrl)) {
      throw new ConfigError(`invalid repository URL: '${repoUrl}'`);
    }
  } else if (repoPath !== undefined) {
    if (repoPath.trim() === '') {
      throw new ConfigError('--repo-path is empty');
    }
    if (!existsSync(repoPath)) {
      throw new ConfigError(`--repo-path not found: '${repoPath}'`);
    }
    if (testMode === 'off') {
      throw new ConfigError(
        "--repo-path requires --test-mode readonly or simulate, but --test-mode is 'off'",
      );
    }
  }

  return {
    packageName,
    repoUrl,
    repoPath,
    testMode,
    asciiTree,
    maxDepth: parseMaxDepth(options.maxDepth ?? String(DEFAULTS.MAX_DEPTH)),
    filter: options.filter ?? DEFAULTS.FILTER,
    wbs: options.wbs ?? false,
    verbose: options.verbose ?? false,
  };
}

export function formatConfig(config: CliConfig): string[] {
  const entries: [string, string | number][] = [
    ['package', config.packageName],
    ['repo_url', config.repoUrl ?? ''],
    ['repo_path', config.repoPath ?? ''],
    ['test_mode', config.testMode],
    ['ascii_tree', config.asciiTree],
    ['max_depth', config.maxDepth],
    ['filter', config.filter],
  ];
  return entries
    .filter(([, value]) => value !== '' && value !== 0)
    .map(([key, value]) => `${key}=${value}`);
}
