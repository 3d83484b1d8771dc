/**
 * Multi-source breadth-first search over the reverse import graph.
 */
import { compareStrings } from '../graph/builder.js';
import type { ModuleId, ReverseGraph } from '../graph/types.js';

/**
 * Paths from the nearest seed to every module that transitively imports one
 * of the seeds. Seeds themselves get no entry.
 *
 * Each module is visited once. Seeds are enqueued in sorted order and
 * importers are expanded in sorted order, so a module receives a chain of
 * minimum length and, among chains of that length, the lexicographically
 * smallest one (compared element by element from the seed).
 */
export function traceDependencyPaths(
  reverse: ReverseGraph,
  seeds: Iterable<ModuleId>
): Map<ModuleId, ModuleId[]> {
  const paths = new Map<ModuleId, ModuleId[]>();
  const ordered = [...new Set(seeds)].sort(compareStrings);
  const visited = new Set<ModuleId>(ordered);
  const queue: Array<{ module: ModuleId; path: ModuleId[] }> = ordered.map((module) => ({
    module,
    path: [module],
  }));

  for (let head = 0; head < queue.length; head++) {
    const { module, path } = queue[head];
    const importers = [...(reverse.get(module) ?? [])].sort(compareStrings);
    for (const importer of importers) {
      if (visited.has(importer)) continue;
      visited.add(importer);
      const next = [...path, importer];
      paths.set(importer, next);
      queue.push({ module: importer, path: next });
    }
  }

  return paths;
}
