/**
 * Tests for tree-sitter based extraction of Python import statements.
 */
import { describe, it, expect } from 'vitest';
import {
  createPythonParser,
  parsePythonImports,
} from '../../../../src/core/imports/tree-sitter/python-imports.js';

const parser = createPythonParser();

function parse(source: string, syntaxErrors: 'skip' | 'recover' = 'skip') {
  return parsePythonImports(parser, source, { syntaxErrors });
}

describe('parsePythonImports', () => {
  it('returns an empty list for a module without imports', () => {
    expect(parse('x = 1\n')).toEqual([]);
  });

  it('reads every name of a plain import, dropping aliases', () => {
    expect(parse('import a.b, c.d as e\nimport os\n')).toEqual([
      { kind: 'import', names: ['a.b', 'c.d'] },
      { kind: 'import', names: ['os'] },
    ]);
  });

  it('reads absolute from-imports with several names', () => {
    expect(parse('from pkg.sub import a, b as c\n')).toEqual([
      { kind: 'from', level: 0, module: 'pkg.sub', names: ['a', 'b'] },
    ]);
  });

  it('reads parenthesized name lists', () => {
    expect(parse('from pkg import (\n    a,\n    b,\n)\n')).toEqual([
      { kind: 'from', level: 0, module: 'pkg', names: ['a', 'b'] },
    ]);
  });

  it('reads relative imports with and without a module', () => {
    expect(parse('from . import b\nfrom ..m.n import x, y\n')).toEqual([
      { kind: 'from', level: 1, module: null, names: ['b'] },
      { kind: 'from', level: 2, module: 'm.n', names: ['x', 'y'] },
    ]);
  });

  it('records a wildcard import as the name *', () => {
    expect(parse('from pkg.mod import *\n')).toEqual([
      { kind: 'from', level: 0, module: 'pkg.mod', names: ['*'] },
    ]);
  });

  it('reads __future__ imports', () => {
    expect(parse('from __future__ import annotations\n')).toEqual([
      { kind: 'from', level: 0, module: '__future__', names: ['annotations'] },
    ]);
  });

  it('finds imports nested in functions, classes and conditionals', () => {
    const source = [
      'from typing import TYPE_CHECKING',
      'if TYPE_CHECKING:',
      '    import pkg.types',
      'def load():',
      '    import json',
      '    return json',
      'class Thing:',
      '    try:',
      '        from . import helpers',
      '    except ImportError:',
      '        pass',
      '',
    ].join('\n');

    expect(parse(source)).toEqual([
      { kind: 'from', level: 0, module: 'typing', names: ['TYPE_CHECKING'] },
      { kind: 'import', names: ['pkg.types'] },
      { kind: 'import', names: ['json'] },
      { kind: 'from', level: 1, module: null, names: ['helpers'] },
    ]);
  });

  it('does not mistake strings or comments for imports', () => {
    expect(parse('# import fake\ntext = "import other"\n')).toEqual([]);
  });

  it('returns null for a module with a syntax error', () => {
    expect(parse('import os\ndef broken(:\n    pass\n')).toBeNull();
  });

  it('keeps recognisable imports of a broken module in recover mode', () => {
    const statements = parse('import os\ndef broken(:\n    pass\n', 'recover');
    expect(statements).not.toBeNull();
    expect(statements).toContainEqual({ kind: 'import', names: ['os'] });
  });

  it('accepts sources larger than 32 KiB', () => {
    const filler = '# padding line for a large module\n'.repeat(1200);
    const statements = parse(`${filler}import late.module\n`);
    expect(statements).toEqual([{ kind: 'import', names: ['late.module'] }]);
  });
});
