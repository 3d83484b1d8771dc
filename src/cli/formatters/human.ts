import chalk from 'chalk';
import type { QueryResult, ResultOf } from '../../core/query/types.js';
import type { IFormatter, FormatOptions } from './types.js';

const MODULE_COLUMN_WIDTH = 60;
const TABLE_RULE_WIDTH = 90;

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatResult(result: QueryResult): string {
    switch (result.mode) {
      case 'dep':
        return this.formatInternalEdges(result);
      case 'nodeps':
        return this.formatList('Modules with no internal dependencies:', result.modules);
      case 'nodeps_verbose':
        return this.formatExternalTable(result);
      case 'pkg_dep':
        return this.formatDependents(result);
      case 'not_pkg_dep':
        return this.formatList(
          `Modules NOT dependent (even recursively) on package '${result.package}':`,
          result.modules
        );
      case 'outside_local_dir':
        return this.formatOutsideImports(result);
      case 'encapsulated_dir':
        return this.formatList(
          'Encapsulated directories (only import within own directory tree):',
          result.directories
        );
    }
  }

  private formatInternalEdges(result: ResultOf<'dep'>): string {
    const lines = ['', this.colorize('Internal Imports Found:', 'bold')];
    for (const edge of result.edges) {
      lines.push(`${edge.caller} ${this.colorize('imports', 'dim')} ${edge.target}`);
    }
    return lines.join('\n');
  }

  private formatList(heading: string, items: readonly string[]): string {
    return ['', this.colorize(heading, 'bold'), ...items].join('\n');
  }

  private formatExternalTable(result: ResultOf<'nodeps_verbose'>): string {
    const lines = [
      '',
      this.colorize('Modules with no internal dependencies (external dependencies shown):', 'bold'),
      `${'MODULE'.padEnd(MODULE_COLUMN_WIDTH)} | EXTERNAL IMPORT`,
      '='.repeat(TABLE_RULE_WIDTH),
    ];

    for (const { module, externals } of result.modules) {
      if (externals.length === 0) {
        lines.push(`${module.padEnd(MODULE_COLUMN_WIDTH)} | ${this.colorize('-', 'dim')}`);
        continue;
      }
      externals.forEach((external, index) => {
        const label = index === 0 ? module : '';
        lines.push(`${label.padEnd(MODULE_COLUMN_WIDTH)} | ${external}`);
      });
    }
    return lines.join('\n');
  }

  // Indirect dependents first, then direct ones, each block sorted.
  private formatDependents(result: ResultOf<'pkg_dep'>): string {
    const lines: string[] = [];
    const ordered = [
      ...result.dependents.filter((d) => d.kind === 'indirect'),
      ...result.dependents.filter((d) => d.kind === 'direct'),
    ];
    for (const dependent of ordered) {
      const color = dependent.kind === 'direct' ? 'yellow' : 'cyan';
      lines.push(`${dependent.module} ${this.colorize(`(${dependent.kind})`, color)}`);
      lines.push(`  path: ${dependent.path.join(' -> ')}`);
    }
    if (lines.length === 0) {
      lines.push(this.colorize(`No modules depend on package '${result.package}'.`, 'dim'));
    }
    return lines.join('\n');
  }

  private formatOutsideImports(result: ResultOf<'outside_local_dir'>): string {
    const lines = [
      '',
      this.colorize('Files importing outside their local directory or subdirectories:', 'bold'),
    ];
    for (const caller of result.callers) {
      lines.push(caller.filePath);
      for (const target of caller.targets) {
        lines.push(`  ↳ ${target.filePath}`);
      }
    }
    return lines.join('\n');
  }

  private colorize(
    text: string,
    color: 'yellow' | 'cyan' | 'dim' | 'bold'
  ): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
