/**
 * Tests for module name derivation and relative import resolution.
 */
import { describe, it, expect } from 'vitest';
import {
  canonicalize,
  resolveRelative,
  moduleFileCandidates,
  rootRelativeFileCandidates,
  INVALID_TARGET,
} from '../../../../src/core/modules/resolver.js';

describe('canonicalize', () => {
  it('prefixes the root directory name and dots the relative path', () => {
    expect(canonicalize('/x/pkgA', '/x/pkgA/sub/mod.py')).toBe('pkgA.sub.mod');
  });

  it('names a file directly under the root', () => {
    expect(canonicalize('/x/pkgA', '/x/pkgA/mod.py')).toBe('pkgA.mod');
  });

  it('accepts a relative root and a trailing separator', () => {
    const cwdName = process.cwd().split('/').pop();
    expect(canonicalize('./', `${process.cwd()}/a/b.py`)).toBe(`${cwdName}.a.b`);
    expect(canonicalize('/x/pkgA/', '/x/pkgA/b.py')).toBe('pkgA.b');
  });

  it('returns null for other extensions', () => {
    expect(canonicalize('/x/pkgA', '/x/pkgA/readme.md')).toBeNull();
    expect(canonicalize('/x/pkgA', '/x/pkgA/mod.pyi')).toBeNull();
  });

  it('returns null for files outside the root', () => {
    expect(canonicalize('/x/pkgA', '/x/other/mod.py')).toBeNull();
    expect(canonicalize('/x/pkgA', '/x/pkgA/../escape.py')).toBeNull();
  });

  it('does not treat a sibling with a common prefix as inside the root', () => {
    expect(canonicalize('/x/pkgA', '/x/pkgA2/mod.py')).toBeNull();
  });

  it('keeps __init__ as a segment by default', () => {
    expect(canonicalize('/x/pkgA', '/x/pkgA/__init__.py')).toBe('pkgA.__init__');
    expect(canonicalize('/x/pkgA', '/x/pkgA/sub/__init__.py')).toBe('pkgA.sub.__init__');
  });

  it('collapses __init__ into the package name when asked', () => {
    const options = { collapseInit: true };
    expect(canonicalize('/x/pkgA', '/x/pkgA/__init__.py', options)).toBe('pkgA');
    expect(canonicalize('/x/pkgA', '/x/pkgA/sub/__init__.py', options)).toBe('pkgA.sub');
    expect(canonicalize('/x/pkgA', '/x/pkgA/sub/mod.py', options)).toBe('pkgA.sub.mod');
  });

  it('gives distinct names to distinct files of one root', () => {
    const files = ['a.py', 'b.py', 'sub/a.py', 'sub/deeper/a.py', 'sub_a.py'];
    const names = files.map((f) => canonicalize('/x/r', `/x/r/${f}`));
    expect(new Set(names).size).toBe(files.length);
  });
});

describe('resolveRelative', () => {
  it('strips one segment per level from the caller module', () => {
    expect(resolveRelative(['a', 'b', 'c'], 1)).toBe('a.b');
    expect(resolveRelative(['a', 'b', 'c'], 2)).toBe('a');
  });

  it('appends the dotted module suffix', () => {
    expect(resolveRelative(['a', 'b', 'c'], 1, 'd')).toBe('a.b.d');
    expect(resolveRelative(['a', 'b', 'c'], 2, 'x.y')).toBe('a.x.y');
  });

  it('yields an empty base when the level equals the caller depth', () => {
    expect(resolveRelative(['a', 'b'], 2)).toBe('');
    expect(resolveRelative(['a', 'b'], 2, 'm')).toBe('m');
  });

  it('returns the invalid sentinel when the level exceeds the caller depth', () => {
    expect(resolveRelative(['a', 'b'], 3)).toBe(INVALID_TARGET);
    expect(resolveRelative(['a', 'b'], 3, 'm')).toBe('<invalid>');
  });

  it('does not modify the caller parts', () => {
    const parts = ['a', 'b', 'c'];
    resolveRelative(parts, 1, 'd');
    expect(parts).toEqual(['a', 'b', 'c']);
  });
});

describe('moduleFileCandidates', () => {
  it('lists the module file and the package initializer under a matching root', () => {
    expect(moduleFileCandidates(['/x/pkgA'], 'pkgA.sub.mod')).toEqual([
      '/x/pkgA/sub/mod.py',
      '/x/pkgA/sub/mod/__init__.py',
    ]);
  });

  it('only considers roots named after the first segment', () => {
    expect(moduleFileCandidates(['/x/pkgA', '/y/pkgB'], 'pkgB.c')).toEqual([
      '/y/pkgB/c.py',
      '/y/pkgB/c/__init__.py',
    ]);
    expect(moduleFileCandidates(['/x/pkgA'], 'numpy.linalg')).toEqual([]);
  });

  it('maps a bare root name to its initializer', () => {
    expect(moduleFileCandidates(['/x/pkgA'], 'pkgA')).toEqual(['/x/pkgA/__init__.py']);
  });

  it('returns nothing for an empty identifier', () => {
    expect(moduleFileCandidates(['/x/pkgA'], '')).toEqual([]);
  });
});

describe('rootRelativeFileCandidates', () => {
  it('reads every segment as a directory below the root', () => {
    expect(rootRelativeFileCandidates('/x/proj', 'pkg.mod')).toEqual([
      '/x/proj/pkg/mod.py',
      '/x/proj/pkg/mod/__init__.py',
    ]);
  });

  it('returns nothing for identifiers with empty segments', () => {
    expect(rootRelativeFileCandidates('/x/proj', '')).toEqual([]);
    expect(rootRelativeFileCandidates('/x/proj', 'pkg..mod')).toEqual([]);
  });
});
