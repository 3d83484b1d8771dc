import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { OUTPUT_FORMATS } from './types.js';
export type { OutputFormat, FormatOptions, IFormatter } from './types.js';

/**
 * Formatter for the requested output format.
 */
export function createFormatter(options: FormatOptions): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
