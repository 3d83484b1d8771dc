/**
 * Tests for the JSON formatter and formatter selection.
 */
import { describe, it, expect } from 'vitest';
import { createFormatter, HumanFormatter, JsonFormatter } from '../../../../src/cli/formatters/index.js';

describe('JsonFormatter', () => {
  it('prints the result as indented JSON', () => {
    const output = new JsonFormatter().formatResult({
      mode: 'dep',
      edges: [{ caller: 'pkgA.a', target: 'pkgA.b' }],
    });
    expect(JSON.parse(output)).toEqual({
      mode: 'dep',
      edges: [{ caller: 'pkgA.a', target: 'pkgA.b' }],
    });
    expect(output.split('\n')[1]).toBe('  "mode": "dep",');
  });
});

describe('createFormatter', () => {
  it('picks the formatter for the format', () => {
    expect(createFormatter({ format: 'json', colors: false })).toBeInstanceOf(JsonFormatter);
    expect(createFormatter({ format: 'human', colors: false })).toBeInstanceOf(HumanFormatter);
  });
});
