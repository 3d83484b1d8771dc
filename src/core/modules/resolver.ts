/**
 * Mapping between Python source files and dotted module identifiers.
 */
import * as path from 'node:path';
import type { ModuleId } from '../graph/types.js';

export const SOURCE_EXTENSION = '.py';
export const PACKAGE_INIT = '__init__';

/** Target of a relative import that climbs above the caller's top package. */
export const INVALID_TARGET = '<invalid>';

export interface CanonicalizeOptions {
  /** Drop a trailing `__init__` segment so a package maps to its directory name */
  collapseInit?: boolean;
}

/**
 * Derive the module identifier of `filePath` under `root`.
 *
 * The root's own directory name is the first segment, followed by the path
 * relative to the root with the extension stripped:
 * `/x/pkgA` + `/x/pkgA/sub/mod.py` gives `pkgA.sub.mod`.
 *
 * Returns null for files without the `.py` extension and for files outside
 * the root.
 */
export function canonicalize(
  root: string,
  filePath: string,
  options: CanonicalizeOptions = {}
): ModuleId | null {
  const absRoot = path.resolve(root);
  const absFile = path.resolve(filePath);

  if (!absFile.endsWith(SOURCE_EXTENSION)) return null;

  const rel = path.relative(absRoot, absFile);
  if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) return null;

  const segments = rel.slice(0, -SOURCE_EXTENSION.length).split(path.sep);
  if (options.collapseInit && segments[segments.length - 1] === PACKAGE_INIT) {
    segments.pop();
  }

  return [path.basename(absRoot), ...segments].join('.');
}

/**
 * Resolve the base of a relative import.
 *
 * `level` trailing segments are removed from the caller's own module path
 * (`from . import x` inside `a.b.c` is based on `a.b`), then the optional
 * dotted suffix is appended. A level deeper than the caller yields
 * {@link INVALID_TARGET}.
 */
export function resolveRelative(
  callerParts: readonly string[],
  level: number,
  moduleSuffix?: string | null
): string {
  if (level > callerParts.length) {
    return INVALID_TARGET;
  }

  const base = callerParts.slice(0, callerParts.length - level);
  if (moduleSuffix) {
    base.push(...moduleSuffix.split('.'));
  }
  return base.join('.');
}

/**
 * Files that would define `moduleId` read as a path below `root` itself:
 * `<root>/<a>/<b>.py` and `<root>/<a>/<b>/__init__.py` for `a.b`.
 */
export function rootRelativeFileCandidates(root: string, moduleId: string): string[] {
  const segments = moduleId.split('.');
  if (segments.some((segment) => segment === '')) return [];

  const absRoot = path.resolve(root);
  return [
    path.join(absRoot, ...segments) + SOURCE_EXTENSION,
    path.join(absRoot, ...segments, PACKAGE_INIT + SOURCE_EXTENSION),
  ];
}

/**
 * Files that would define `moduleId`: `<root>/<rest>.py` and
 * `<root>/<rest>/__init__.py`, for every root whose directory name matches
 * the first segment of the identifier.
 */
export function moduleFileCandidates(
  roots: readonly string[],
  moduleId: string
): string[] {
  const [head, ...rest] = moduleId.split('.');
  if (!head) return [];

  const candidates: string[] = [];
  for (const root of roots) {
    const absRoot = path.resolve(root);
    if (path.basename(absRoot) !== head) continue;

    if (rest.length > 0) {
      candidates.push(path.join(absRoot, ...rest) + SOURCE_EXTENSION);
    }
    candidates.push(path.join(absRoot, ...rest, PACKAGE_INIT + SOURCE_EXTENSION));
  }
  return candidates;
}
