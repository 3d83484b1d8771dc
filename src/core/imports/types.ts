/**
 * Types for Python import extraction.
 */
import type { SyntaxErrorPolicy } from '../config/schema.js';

/**
 * `import a.b, c as d`. Names are the dotted module paths; aliases are dropped.
 */
export interface PlainImport {
  kind: 'import';
  names: string[];
}

/**
 * `from X import a, b`, `from . import a`, `from ..m import *`.
 */
export interface FromImport {
  kind: 'from';
  /** Number of leading dots; 0 for an absolute import */
  level: number;
  /** Dotted module after the dots, null for `from . import x` */
  module: string | null;
  /** Imported names, `*` for a wildcard import */
  names: string[];
}

export type ImportStatement = PlainImport | FromImport;

export interface ParseOptions {
  syntaxErrors?: SyntaxErrorPolicy;
}

/** Existence check for an absolute file path. */
export type FileExists = (filePath: string) => boolean;

/**
 * Inputs of edge resolution. Pure data: no I/O happens while resolving.
 */
export interface ResolveContext {
  /** Absolute root directories */
  roots: readonly string[];
  /** Known source files */
  fileExists: FileExists;
  /** Probe the names of relative `from` imports like absolute ones */
  probeRelativeNames: boolean;
  /** Absolute root the importing file was found under */
  callerRoot?: string;
}
