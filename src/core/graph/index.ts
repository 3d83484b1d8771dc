export { GraphBuilder, buildModuleGraph, reverseGraph, compareStrings } from './builder.js';
export type { GraphBuildOptions } from './builder.js';
export type {
  ModuleId,
  ImportEdge,
  ModuleRecord,
  ReverseGraph,
  DiscoveredFile,
  ModuleGraph,
  BuildStats,
  BuildResult,
} from './types.js';
