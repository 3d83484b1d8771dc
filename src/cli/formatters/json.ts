import type { QueryResult } from '../../core/query/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatResult(result: QueryResult): string {
    return JSON.stringify(result, null, 2);
  }
}
