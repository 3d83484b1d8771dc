export {
  runQuery,
  findInternalEdges,
  findUnreferencedModules,
  findExternalImports,
  findDirectDependents,
  findPackageDependents,
  findNonDependents,
  findOutsideLocalImports,
  findEncapsulatedDirectories,
} from './engine.js';
export { traceDependencyPaths } from './bfs.js';
export { QUERY_MODES, PACKAGE_MODES } from './types.js';
export type {
  Query,
  QueryMode,
  PackageQueryMode,
  QueryResult,
  ResultOf,
  Dependent,
  ExternalImports,
  LocatedModule,
  OutsideImports,
} from './types.js';
