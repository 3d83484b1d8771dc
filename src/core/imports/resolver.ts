/**
 * Turns parsed import statements into import edges.
 *
 * `from X import y` is ambiguous: `y` may be a submodule or any attribute of
 * `X`. The name is treated as a module only when a file defining `X.y` is
 * known; otherwise the edge falls back to `X` itself.
 *
 * For absolute imports the file is first looked up as `<root>/X/y.py` (or
 * `<root>/X/y/__init__.py`) below the caller's own root, then under every
 * root named after the first segment of `X`.
 */
import {
  INVALID_TARGET,
  moduleFileCandidates,
  resolveRelative,
  rootRelativeFileCandidates,
} from '../modules/resolver.js';
import type { ImportEdge, ModuleId } from '../graph/types.js';
import type { FromImport, ImportStatement, ResolveContext } from './types.js';

/**
 * Resolve the statements of one module. One edge per imported name.
 *
 * Relative imports climb from `callerParts`, which defaults to the segments
 * of `caller`. A package named after its directory passes its segments plus
 * `__init__` so that `from . import x` stays inside the package.
 */
export function resolveImportEdges(
  caller: ModuleId,
  statements: readonly ImportStatement[],
  context: ResolveContext,
  callerParts: readonly string[] = caller.split('.')
): ImportEdge[] {
  const edges: ImportEdge[] = [];

  for (const statement of statements) {
    if (statement.kind === 'import') {
      for (const name of statement.names) {
        edges.push({ caller, target: name });
      }
      continue;
    }

    for (const target of resolveFromImport(callerParts, statement, context)) {
      edges.push({ caller, target });
    }
  }

  return edges;
}

function resolveFromImport(
  callerParts: readonly string[],
  statement: FromImport,
  context: ResolveContext
): string[] {
  if (statement.level === 0) {
    const base = statement.module ?? '';
    return statement.names.map((name) => probeName(base, name, context, true));
  }

  const base = resolveRelative(callerParts, statement.level, statement.module);
  if (base === INVALID_TARGET || !context.probeRelativeNames || statement.names.length === 0) {
    return [base];
  }
  return statement.names.map((name) => probeName(base, name, context));
}

/**
 * `base.name` when a module or package file for it is known, else `base`.
 * `fromCallerRoot` also accepts a file below the caller's root.
 */
export function probeName(
  base: string,
  name: string,
  context: ResolveContext,
  fromCallerRoot = false
): string {
  const qualified = base ? `${base}.${name}` : name;
  const candidates = moduleFileCandidates(context.roots, qualified);
  if (fromCallerRoot && context.callerRoot !== undefined) {
    candidates.unshift(...rootRelativeFileCandidates(context.callerRoot, qualified));
  }
  const known = candidates.some((candidate) => context.fileExists(candidate));
  return known ? qualified : base;
}
