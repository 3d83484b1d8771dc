/**
 * GraphBuilder - discovers the modules under a set of roots and collects
 * their import edges into one immutable ModuleGraph.
 */
import * as path from 'node:path';
import os from 'node:os';
import { globFiles } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { ImportExtractor } from '../imports/extractor.js';
import type { ExtractOutcome } from '../imports/extractor.js';
import { canonicalize, SOURCE_EXTENSION } from '../modules/resolver.js';
import type { SyntaxErrorPolicy } from '../config/schema.js';
import type {
  BuildResult,
  DiscoveredFile,
  ImportEdge,
  ModuleId,
  ReverseGraph,
} from './types.js';

const log = logger.child('graph');

/** Default concurrency for parallel file operations */
const DEFAULT_CONCURRENCY = Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 4), 32);

export interface GraphBuildOptions {
  /** fast-glob ignore patterns, relative to each root */
  exclude?: string[];
  collapseInit?: boolean;
  probeRelativeNames?: boolean;
  syntaxErrors?: SyntaxErrorPolicy;
  concurrency?: number;
}

export class GraphBuilder {
  private options: GraphBuildOptions;

  constructor(options: GraphBuildOptions = {}) {
    this.options = options;
  }

  /**
   * Build the import graph of every `.py` file under `roots`.
   *
   * Files are visited root by root in the given order and sorted within a
   * root, so the module record ("last writer wins" on a name collision) and
   * the edge list do not depend on filesystem order.
   */
  async build(roots: readonly string[]): Promise<BuildResult> {
    const startTime = performance.now();
    const absRoots = roots.map((root) => path.resolve(root));

    const files = await this.discover(absRoots);
    const modules = new Set<ModuleId>();
    const moduleToPath = new Map<ModuleId, string>();
    for (const file of files) {
      modules.add(file.moduleId);
      moduleToPath.set(file.moduleId, file.filePath);
    }

    const knownFiles = new Set(files.map((file) => file.filePath));
    const extractor = new ImportExtractor({
      roots: absRoots,
      fileExists: (filePath) => knownFiles.has(path.resolve(filePath)),
      probeRelativeNames: this.options.probeRelativeNames ?? true,
      collapseInit: this.options.collapseInit,
      syntaxErrors: this.options.syntaxErrors,
    });

    // Collect per-file results first, then merge in discovery order
    const outcomes: ExtractOutcome[] = new Array(files.length);
    await processInBatches(
      files.map((file, index) => ({ file, index })),
      this.options.concurrency ?? DEFAULT_CONCURRENCY,
      async ({ file, index }) => {
        outcomes[index] = await extractor.analyzeFile(file.root, file.filePath);
      }
    );

    const edges: ImportEdge[] = [];
    const failedFiles: string[] = [];
    outcomes.forEach((outcome, index) => {
      edges.push(...outcome.edges);
      if (outcome.status === 'unreadable' || outcome.status === 'unparsable') {
        failedFiles.push(files[index].filePath);
      }
    });

    const graph = {
      roots: absRoots,
      modules,
      edges,
      moduleToPath,
      files,
      reverse: reverseGraph(edges),
    };
    const stats = {
      fileCount: files.length,
      moduleCount: modules.size,
      edgeCount: edges.length,
      failedFiles,
      buildTimeMs: performance.now() - startTime,
    };

    log.debug('Import graph built', {
      files: stats.fileCount,
      modules: stats.moduleCount,
      edges: stats.edgeCount,
      failed: failedFiles.length,
      ms: Math.round(stats.buildTimeMs),
    });
    if (failedFiles.length > 0) {
      log.warn(`${failedFiles.length} file(s) could not be read or parsed; they contribute no imports`);
    }

    return { graph, stats };
  }

  /**
   * Every `.py` file under each root, with its module identifier.
   */
  async discover(absRoots: readonly string[]): Promise<DiscoveredFile[]> {
    const discovered: DiscoveredFile[] = [];
    for (const root of absRoots) {
      const found = await globFiles(`**/*${SOURCE_EXTENSION}`, {
        cwd: root,
        ignore: this.options.exclude ?? [],
        absolute: true,
        dot: true,
      });
      const sorted = found.map((filePath) => path.resolve(filePath)).sort(compareStrings);
      for (const filePath of sorted) {
        const moduleId = canonicalize(root, filePath, { collapseInit: this.options.collapseInit });
        if (moduleId) {
          discovered.push({ root, filePath, moduleId });
        }
      }
    }
    return discovered;
  }
}

/**
 * Target to the set of its callers. Repeated (caller, target) pairs collapse.
 */
export function reverseGraph(edges: readonly ImportEdge[]): ReverseGraph {
  const reverse = new Map<string, Set<ModuleId>>();
  for (const { caller, target } of edges) {
    let callers = reverse.get(target);
    if (!callers) {
      callers = new Set();
      reverse.set(target, callers);
    }
    callers.add(caller);
  }
  return reverse;
}

/**
 * Build the import graph of `roots`.
 */
export async function buildModuleGraph(
  roots: readonly string[],
  options: GraphBuildOptions = {}
): Promise<BuildResult> {
  return new GraphBuilder(options).build(roots);
}

/** Code-unit order, independent of locale. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Process items in batches with concurrency limit. Limits below one run the
 * items one at a time.
 */
async function processInBatches<T>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<void>
): Promise<void> {
  const limit = Math.max(1, Math.floor(concurrency)) || 1;
  for (let i = 0; i < items.length; i += limit) {
    const batch = items.slice(i, i + limit);
    await Promise.all(batch.map(processor));
  }
}
