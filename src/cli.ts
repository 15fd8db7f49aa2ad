import chalk from 'chalk';
import { CommanderError } from 'commander';
import ora, { type Ora } from 'ora';

import {
  createProgram,
  formatConfig,
  readPackageVersion,
  validateOptions,
} from './config.js';
import { EXIT_CODES, MESSAGES, formatMessage } from './constants.js';
import { ConfigError, ParseError, SourceError } from './errors.js';
import { buildDependencyGraph, countEdges } from './graph.js';
import { logNewlines, sortedDependencies } from './helpers.js';
import type {
  CliConfig,
  CliOptions,
  DependencyGraph,
  FetchIndex,
  PackageRelation,
} from './interfaces.js';
import { renderAsciiTree, renderSummaryTable, renderWbs } from './render.js';
import { loadIndexText, parseIndex } from './source.js';

// Spinner shown while the index loads; stopped on exit signals
let activeSpinner: Ora | null = null;

export function stopActiveSpinner(): void {
  if (activeSpinner) {
    activeSpinner.stop();
    activeSpinner = null;
  }
}

export interface RunOptions {
  fetchImpl?: FetchIndex;
  version?: string;
}

function reportError(message: string): void {
  console.error(chalk.red(`${MESSAGES.error} ${message}`));
}

function parseArguments(
  argv: string[],
  version: string,
): CliOptions | number {
  const program = createProgram(version);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE;
    }
    throw error;
  }
  return program.opts<CliOptions>();
}

async function loadRelation(
  config: CliConfig,
  fetchImpl?: FetchIndex,
): Promise<PackageRelation> {
  const spinner = ora({ text: MESSAGES.loadingIndex, spinner: 'dots' });
  activeSpinner = spinner;
  spinner.start();
  try {
    const text = await loadIndexText(config, fetchImpl);
    spinner.succeed(MESSAGES.indexLoaded);
    return parseIndex(text, config.testMode);
  } catch (error) {
    if (error instanceof SourceError) {
      spinner.fail(MESSAGES.indexFailed);
    } else {
      spinner.stop();
    }
    throw error;
  } finally {
    activeSpinner = null;
  }
}

function printGraph(config: CliConfig, graph: DependencyGraph): void {
  const root = config.packageName;

  if (config.asciiTree !== 'off') {
    console.log(renderAsciiTree(graph, root, config.asciiTree));
  }
  if (config.wbs) {
    if (config.asciiTree !== 'off') logNewlines();
    console.log(renderWbs(graph, root));
  }
  if (config.asciiTree === 'off' && !config.wbs) {
    const dependencies = sortedDependencies(graph, root);
    console.log(
      dependencies.length > 0
        ? `${formatMessage(MESSAGES.dependenciesOf, root)} ${dependencies.join(', ')}`
        : formatMessage(MESSAGES.noDependencies, root, config.maxDepth),
    );
  }

  if (config.verbose) {
    logNewlines();
    console.log(renderSummaryTable(graph));
    console.log(
      chalk.gray(`Packages: ${graph.size}, edges: ${countEdges(graph)}`),
    );
  }
}

export async function run(
  argv: string[],
  options: RunOptions = {},
): Promise<number> {
  const version = options.version ?? (await readPackageVersion());
  const parsed = parseArguments(argv, version);
  if (typeof parsed === 'number') {
    return parsed;
  }

  try {
    const config = validateOptions(parsed);

    if (config.verbose) {
      console.log(chalk.cyan(MESSAGES.title));
      for (const line of formatConfig(config)) {
        console.log(line);
      }
      logNewlines();
    }

    const relation = await loadRelation(config, options.fetchImpl);

    if (!relation.has(config.packageName)) {
      reportError(formatMessage(MESSAGES.packageNotFound, config.packageName));
      return EXIT_CODES.USAGE;
    }

    const graph = buildDependencyGraph(
      config.packageName,
      relation,
      config.maxDepth,
      config.filter,
    );
    printGraph(config, graph);
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof ParseError) {
      reportError(error.message);
      return EXIT_CODES.USAGE;
    }
    if (error instanceof SourceError) {
      reportError(error.message);
      return EXIT_CODES.FAILURE;
    }
    console.error(chalk.red(MESSAGES.fatalError), error);
    return EXIT_CODES.FAILURE;
  }
}
