/**
 * Temporary Python source trees for tests.
 */
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { reverseGraph } from '../../src/core/graph/builder.js';
import type { DiscoveredFile, ImportEdge, ModuleGraph } from '../../src/core/graph/types.js';

/**
 * Create a fresh temporary directory and write `files` (relative path to
 * content) beneath it. Returns the directory.
 */
export async function createTree(files: Record<string, string | Buffer>): Promise<string> {
  const base = await mkdtemp(join(tmpdir(), 'pymodgraph-test-'));
  for (const [relPath, content] of Object.entries(files)) {
    const full = join(base, relPath);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content);
  }
  return base;
}

export async function removeTree(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Assemble a ModuleGraph by hand. Module ids and paths come from `files`.
 */
export function makeGraph(
  files: DiscoveredFile[],
  edges: Array<[string, string]>,
  roots: string[] = [...new Set(files.map((f) => f.root))]
): ModuleGraph {
  const importEdges: ImportEdge[] = edges.map(([caller, target]) => ({ caller, target }));
  return {
    roots,
    modules: new Set(files.map((f) => f.moduleId)),
    edges: importEdges,
    moduleToPath: new Map(files.map((f) => [f.moduleId, f.filePath] as const)),
    files,
    reverse: reverseGraph(importEdges),
  };
}

/**
 * Shorthand for a DiscoveredFile under a posix root: `file('/r/pkg', 'a/b.py')`
 * gives module `pkg.a.b`.
 */
export function file(root: string, relPath: string): DiscoveredFile {
  const rootName = root.split('/').pop() ?? '';
  const moduleId = [rootName, ...relPath.replace(/\.py$/, '').split('/')].join('.');
  return { root, filePath: `${root}/${relPath}`, moduleId };
}
