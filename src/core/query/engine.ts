/**
 * Query engine over a built ModuleGraph. Every query is read-only and returns
 * sorted, deduplicated data.
 */
import * as path from 'node:path';
import { isWithinDirectory } from '../../utils/file-system.js';
import { compareStrings } from '../graph/builder.js';
import { INVALID_TARGET } from '../modules/resolver.js';
import type { ImportEdge, ModuleGraph, ModuleId } from '../graph/types.js';
import { traceDependencyPaths } from './bfs.js';
import type {
  Dependent,
  ExternalImports,
  OutsideImports,
  Query,
  QueryResult,
} from './types.js';

/**
 * Run one query against the graph.
 */
export function runQuery(graph: ModuleGraph, query: Query): QueryResult {
  switch (query.mode) {
    case 'dep':
      return { mode: 'dep', edges: findInternalEdges(graph) };
    case 'nodeps':
      return { mode: 'nodeps', modules: findUnreferencedModules(graph) };
    case 'nodeps_verbose':
      return { mode: 'nodeps_verbose', modules: findExternalImports(graph) };
    case 'pkg_dep':
      return {
        mode: 'pkg_dep',
        package: query.package,
        dependents: findPackageDependents(graph, query.package),
      };
    case 'not_pkg_dep':
      return {
        mode: 'not_pkg_dep',
        package: query.package,
        modules: findNonDependents(graph, query.package),
      };
    case 'outside_local_dir':
      return { mode: 'outside_local_dir', callers: findOutsideLocalImports(graph) };
    case 'encapsulated_dir':
      return { mode: 'encapsulated_dir', directories: findEncapsulatedDirectories(graph) };
    default: {
      const unreachable: never = query;
      throw new Error(`Unknown query: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Distinct edges whose target is a known module.
 */
export function findInternalEdges(graph: ModuleGraph): ImportEdge[] {
  const seen = new Set<string>();
  const internal: ImportEdge[] = [];
  for (const edge of graph.edges) {
    if (!graph.modules.has(edge.target)) continue;
    const key = `${edge.caller}\n${edge.target}`;
    if (seen.has(key)) continue;
    seen.add(key);
    internal.push({ caller: edge.caller, target: edge.target });
  }
  return internal.sort(
    (a, b) => compareStrings(a.caller, b.caller) || compareStrings(a.target, b.target)
  );
}

/**
 * Modules without a single import of another known module.
 */
export function findUnreferencedModules(graph: ModuleGraph): ModuleId[] {
  const hasInternal = new Set<ModuleId>();
  for (const { caller, target } of graph.edges) {
    if (graph.modules.has(target)) hasInternal.add(caller);
  }
  return [...graph.modules].filter((m) => !hasInternal.has(m)).sort(compareStrings);
}

/**
 * {@link findUnreferencedModules}, each with the targets it imports from
 * outside the analysed roots.
 */
export function findExternalImports(graph: ModuleGraph): ExternalImports[] {
  const externals = new Map<ModuleId, Set<string>>();
  for (const { caller, target } of graph.edges) {
    if (graph.modules.has(target)) continue;
    let targets = externals.get(caller);
    if (!targets) {
      targets = new Set();
      externals.set(caller, targets);
    }
    targets.add(target);
  }

  return findUnreferencedModules(graph).map((module) => ({
    module,
    externals: [...(externals.get(module) ?? [])].sort(compareStrings),
  }));
}

/**
 * Callers importing `pkg` itself or anything below it (`pkg.*`). Relative
 * imports that climbed above their top package match nothing.
 */
export function findDirectDependents(graph: ModuleGraph, pkg: string): Set<ModuleId> {
  const prefix = `${pkg}.`;
  const direct = new Set<ModuleId>();
  if (pkg === INVALID_TARGET) return direct;
  for (const { caller, target } of graph.edges) {
    if (target === pkg || target.startsWith(prefix)) direct.add(caller);
  }
  return direct;
}

/**
 * Direct dependents of `pkg` and every module reaching one of them through
 * imports, with the chain that connects it to the package.
 */
export function findPackageDependents(graph: ModuleGraph, pkg: string): Dependent[] {
  const direct = findDirectDependents(graph, pkg);
  const indirect = traceDependencyPaths(graph.reverse, direct);

  const dependents: Dependent[] = [];
  for (const module of direct) {
    dependents.push({ module, kind: 'direct', path: [pkg, module] });
  }
  for (const [module, chain] of indirect) {
    dependents.push({ module, kind: 'indirect', path: [pkg, ...chain] });
  }
  return dependents.sort((a, b) => compareStrings(a.module, b.module));
}

/**
 * Known modules that neither import `pkg` nor reach it transitively.
 */
export function findNonDependents(graph: ModuleGraph, pkg: string): ModuleId[] {
  const dependent = new Set(findPackageDependents(graph, pkg).map((d) => d.module));
  return [...graph.modules].filter((m) => !dependent.has(m)).sort(compareStrings);
}

/**
 * Modules importing a known module whose file is outside the importer's own
 * directory and its subdirectories. Targets without a file are not reported.
 */
export function findOutsideLocalImports(graph: ModuleGraph): OutsideImports[] {
  const outside = new Map<ModuleId, Set<ModuleId>>();
  for (const { caller, target } of graph.edges) {
    const callerPath = graph.moduleToPath.get(caller);
    const targetPath = graph.moduleToPath.get(target);
    if (callerPath === undefined || targetPath === undefined) continue;
    if (isWithinDirectory(targetPath, path.dirname(callerPath))) continue;

    let targets = outside.get(caller);
    if (!targets) {
      targets = new Set();
      outside.set(caller, targets);
    }
    targets.add(target);
  }

  return [...outside.keys()].sort(compareStrings).map((module) => ({
    module,
    filePath: locate(graph, module),
    targets: [...(outside.get(module) ?? [])]
      .sort(compareStrings)
      .map((target) => ({ module: target, filePath: locate(graph, target) })),
  }));
}

/**
 * Directories whose own modules (not those of subdirectories) import known
 * modules only from inside the directory's subtree. A directory is judged
 * once per root it was discovered under and reported once.
 */
export function findEncapsulatedDirectories(graph: ModuleGraph): string[] {
  const targetsByCaller = new Map<ModuleId, string[]>();
  for (const { caller, target } of graph.edges) {
    const targets = targetsByCaller.get(caller);
    if (targets) {
      targets.push(target);
    } else {
      targetsByCaller.set(caller, [target]);
    }
  }

  const localModules = new Map<string, { dir: string; modules: ModuleId[] }>();
  for (const file of graph.files) {
    const dir = path.dirname(file.filePath);
    const key = `${file.root}\n${dir}`;
    const entry = localModules.get(key);
    if (entry) {
      entry.modules.push(file.moduleId);
    } else {
      localModules.set(key, { dir, modules: [file.moduleId] });
    }
  }

  const encapsulated = new Set<string>();
  for (const { dir, modules } of localModules.values()) {
    const leaks = modules.some((module) =>
      (targetsByCaller.get(module) ?? []).some((target) => {
        const targetPath = graph.moduleToPath.get(target);
        return targetPath !== undefined && !isWithinDirectory(targetPath, dir);
      })
    );
    if (modules.length > 0 && !leaks) encapsulated.add(dir);
  }

  return [...encapsulated].sort(compareStrings);
}

function locate(graph: ModuleGraph, module: ModuleId): string {
  return graph.moduleToPath.get(module) ?? module;
}
