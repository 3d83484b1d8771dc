/**
 * Types for the module import graph.
 */

/** Dotted module identifier, e.g. `pkg.sub.mod`. */
export type ModuleId = string;

/**
 * One imported name of one import statement.
 */
export interface ImportEdge {
  /** Module containing the import statement */
  caller: ModuleId;
  /**
   * A known module, a coarser package identifier when the imported name is
   * not a file, or `<invalid>` for an impossible relative import.
   */
  target: string;
}

/** Module identifier to absolute file path. */
export type ModuleRecord = ReadonlyMap<ModuleId, string>;

/** Import target to the set of modules importing it. */
export type ReverseGraph = ReadonlyMap<string, ReadonlySet<ModuleId>>;

/**
 * A source file found under one of the roots.
 */
export interface DiscoveredFile {
  /** Absolute root directory the file was found under */
  root: string;
  /** Absolute file path */
  filePath: string;
  moduleId: ModuleId;
}

/**
 * The complete import graph of one analysis run. Read-only once built.
 */
export interface ModuleGraph {
  /** Absolute root directories, in the order given */
  roots: readonly string[];
  modules: ReadonlySet<ModuleId>;
  edges: readonly ImportEdge[];
  moduleToPath: ModuleRecord;
  /** Every discovered file, roots in order and files sorted within a root */
  files: readonly DiscoveredFile[];
  reverse: ReverseGraph;
}

/**
 * Counters collected while building the graph.
 */
export interface BuildStats {
  fileCount: number;
  moduleCount: number;
  edgeCount: number;
  /** Files that could not be read or parsed */
  failedFiles: string[];
  buildTimeMs: number;
}

export interface BuildResult {
  graph: ModuleGraph;
  stats: BuildStats;
}
