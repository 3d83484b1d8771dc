/**
 * Query and result types of the analysis modes.
 */
import type { ImportEdge, ModuleId } from '../graph/types.js';

export const QUERY_MODES = [
  'dep',
  'nodeps',
  'nodeps_verbose',
  'pkg_dep',
  'not_pkg_dep',
  'outside_local_dir',
  'encapsulated_dir',
] as const;

export type QueryMode = (typeof QUERY_MODES)[number];

/** Modes that take a package argument. */
export const PACKAGE_MODES = ['pkg_dep', 'not_pkg_dep'] as const satisfies readonly QueryMode[];

export type PackageQueryMode = (typeof PACKAGE_MODES)[number];

export type Query =
  | { mode: 'dep' }
  | { mode: 'nodeps' }
  | { mode: 'nodeps_verbose' }
  | { mode: 'pkg_dep'; package: string }
  | { mode: 'not_pkg_dep'; package: string }
  | { mode: 'outside_local_dir' }
  | { mode: 'encapsulated_dir' };

/** A module with the imports that leave the analysed roots. */
export interface ExternalImports {
  module: ModuleId;
  /** Sorted, distinct targets that are not known modules */
  externals: string[];
}

export interface Dependent {
  module: ModuleId;
  kind: 'direct' | 'indirect';
  /**
   * Chain from the queried package to this module along reverse import
   * edges: `[package, directDependent, ..., module]`.
   */
  path: string[];
}

export interface LocatedModule {
  module: ModuleId;
  filePath: string;
}

/** A module and the known modules it imports from outside its directory. */
export interface OutsideImports extends LocatedModule {
  targets: LocatedModule[];
}

export type QueryResult =
  | { mode: 'dep'; edges: ImportEdge[] }
  | { mode: 'nodeps'; modules: ModuleId[] }
  | { mode: 'nodeps_verbose'; modules: ExternalImports[] }
  | { mode: 'pkg_dep'; package: string; dependents: Dependent[] }
  | { mode: 'not_pkg_dep'; package: string; modules: ModuleId[] }
  | { mode: 'outside_local_dir'; callers: OutsideImports[] }
  | { mode: 'encapsulated_dir'; directories: string[] };

export type ResultOf<M extends QueryMode> = Extract<QueryResult, { mode: M }>;
