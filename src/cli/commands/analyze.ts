import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { GraphBuilder } from '../../core/graph/builder.js';
import { runQuery } from '../../core/query/engine.js';
import { PACKAGE_MODES, QUERY_MODES } from '../../core/query/types.js';
import type { PackageQueryMode, Query, QueryMode } from '../../core/query/types.js';
import { ErrorCodes, UsageError } from '../../utils/errors.js';
import { isDirectory } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { createFormatter, OUTPUT_FORMATS } from '../formatters/index.js';
import type { OutputFormat } from '../formatters/index.js';

interface AnalyzeOptions {
  root: string[];
  mode: string;
  config?: string;
  format: string;
  collapseInit?: boolean;
  probeRelativeNames?: boolean;
  concurrency?: number;
  color: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

const MODE_HELP = `
Modes:
  dep                 internal imports: edges whose target is a module under the roots
  nodeps              modules that import no module under the roots
  nodeps_verbose      same as nodeps, with a table of their external imports
  pkg_dep             modules depending on <package>, directly or transitively
  not_pkg_dep         modules not depending on <package>, even transitively
  outside_local_dir   modules importing modules outside their own directory tree
  encapsulated_dir    directories whose modules only import within their own tree`;

/**
 * Create the analysis command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('pymodgraph')
    .description('Analyze the import graph of Python source trees')
    .argument('[package]', 'Package name for pkg_dep and not_pkg_dep')
    .option('--root <dir>', 'Root directory (repeatable)', collect, [])
    .addOption(
      new Option('--mode <mode>', 'Analysis mode').choices(QUERY_MODES).makeOptionMandatory()
    )
    .option('-c, --config <path>', 'Path to config file (default: .pymodgraph.yaml)')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('human')
    )
    .option('--collapse-init', 'Name packages after their directory instead of pkg.__init__')
    .option('--probe-relative-names', 'Resolve names of relative from-imports against files')
    .option('--no-probe-relative-names', 'Emit one edge per relative from-import')
    .option('--concurrency <n>', 'Files parsed in parallel', parsePositiveInt)
    .option('--no-color', 'Disable colored output')
    .option('--verbose', 'Log debug information to stderr')
    .option('--quiet', 'Suppress all logging')
    .addHelpText('after', MODE_HELP)
    .action(async (pkg: string | undefined, options: AnalyzeOptions) => {
      try {
        await runAnalyze(pkg, options);
      } catch (error) {
        if (error instanceof UsageError) {
          console.error(chalk.red(`Error: ${error.message}`));
          process.exit(2);
        }
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runAnalyze(pkg: string | undefined, options: AnalyzeOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  log.setLevel(options.quiet ? 'silent' : options.verbose ? 'debug' : config.log_level);

  const query = toQuery(options.mode, pkg);
  const format = toFormat(options.format);
  const roots = await resolveRoots(projectRoot, options.root, config);

  const builder = new GraphBuilder({
    exclude: config.exclude,
    collapseInit: options.collapseInit ?? config.collapse_init,
    probeRelativeNames: options.probeRelativeNames ?? config.probe_relative_names,
    syntaxErrors: config.syntax_errors,
    concurrency: options.concurrency ?? config.concurrency,
  });
  const { graph } = await builder.build(roots);

  const result = runQuery(graph, query);
  const formatter = createFormatter({ format, colors: options.color });
  console.log(formatter.formatResult(result));
}

/**
 * Build the query for `mode`; package modes require `pkg`.
 */
export function toQuery(mode: string, pkg: string | undefined): Query {
  if (!isQueryMode(mode)) {
    throw new UsageError(
      ErrorCodes.INVALID_MODE,
      `Invalid mode: ${mode}. Use: ${QUERY_MODES.join(', ')}`
    );
  }

  if (isPackageMode(mode)) {
    if (!pkg) {
      throw new UsageError(
        ErrorCodes.MISSING_PACKAGE,
        `--mode ${mode} requires a package name.`
      );
    }
    return { mode, package: pkg };
  }

  return { mode };
}

async function resolveRoots(
  projectRoot: string,
  cliRoots: string[],
  config: Config
): Promise<string[]> {
  const roots = (cliRoots.length > 0 ? cliRoots : config.roots).map((root) =>
    path.resolve(projectRoot, root)
  );
  if (roots.length === 0) {
    throw new UsageError(ErrorCodes.MISSING_ROOT, 'At least one --root <dir> is required.');
  }

  for (const root of roots) {
    if (!(await isDirectory(root))) {
      log.warn(`Root is not a directory: ${root}`);
    }
  }
  return roots;
}

function toFormat(format: string): OutputFormat {
  const match = OUTPUT_FORMATS.find((f) => f === format);
  if (!match) {
    throw new UsageError(
      ErrorCodes.INVALID_FORMAT,
      `Invalid format: ${format}. Use: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return match;
}

function isQueryMode(mode: string): mode is QueryMode {
  return QUERY_MODES.some((m) => m === mode);
}

function isPackageMode(mode: QueryMode): mode is PackageQueryMode {
  return PACKAGE_MODES.some((m) => m === mode);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
