/**
 * Formatter type definitions.
 */
import type { QueryResult } from '../../core/query/types.js';

/**
 * Output format options.
 */
export const OUTPUT_FORMATS = ['human', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatResult(result: QueryResult): string;
}
