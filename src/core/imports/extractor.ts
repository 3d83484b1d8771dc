/**
 * ImportExtractor - reads one Python file and emits its import edges.
 * A file that cannot be read, decoded or parsed contributes no edges.
 */
import * as path from 'node:path';
import type Parser from 'tree-sitter';
import { readTextFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { canonicalize, PACKAGE_INIT, SOURCE_EXTENSION } from '../modules/resolver.js';
import type { SyntaxErrorPolicy } from '../config/schema.js';
import type { ImportEdge, ModuleId } from '../graph/types.js';
import { createPythonParser, parsePythonImports } from './tree-sitter/python-imports.js';
import { resolveImportEdges } from './resolver.js';
import type { ResolveContext } from './types.js';

const log = logger.child('extract');

export type ExtractStatus = 'ok' | 'not-a-module' | 'unreadable' | 'unparsable';

export interface ExtractOutcome {
  moduleId: ModuleId | null;
  edges: ImportEdge[];
  status: ExtractStatus;
}

export interface ImportExtractorOptions extends Omit<ResolveContext, 'callerRoot'> {
  collapseInit?: boolean;
  syntaxErrors?: SyntaxErrorPolicy;
}

export class ImportExtractor {
  private parser: Parser;
  private options: ImportExtractorOptions;

  constructor(options: ImportExtractorOptions) {
    this.options = options;
    this.parser = createPythonParser();
  }

  /**
   * Import edges of `filePath`, whose module name is derived from `root`.
   */
  async extract(root: string, filePath: string): Promise<ImportEdge[]> {
    const outcome = await this.analyzeFile(root, filePath);
    return outcome.edges;
  }

  /**
   * Like {@link extract}, also reporting why a file produced no edges.
   */
  async analyzeFile(root: string, filePath: string): Promise<ExtractOutcome> {
    const moduleId = canonicalize(root, filePath, { collapseInit: this.options.collapseInit });
    if (!moduleId) {
      return { moduleId: null, edges: [], status: 'not-a-module' };
    }

    let source: string;
    try {
      source = await readTextFile(filePath);
    } catch (error) {
      log.debug(`Cannot read ${filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { moduleId, edges: [], status: 'unreadable' };
    }

    return this.extractFromSource(moduleId, source, filePath, root);
  }

  /**
   * Parse already loaded source text of module `moduleId`, read from
   * `filePath` under `root`.
   */
  extractFromSource(
    moduleId: ModuleId,
    source: string,
    filePath = moduleId,
    root?: string
  ): ExtractOutcome {
    const statements = parsePythonImports(this.parser, source, {
      syntaxErrors: this.options.syntaxErrors,
    });
    if (!statements) {
      log.debug(`Syntax error in ${filePath}, no imports recorded`);
      return { moduleId, edges: [], status: 'unparsable' };
    }

    return {
      moduleId,
      edges: resolveImportEdges(
        moduleId,
        statements,
        { ...this.options, callerRoot: root === undefined ? undefined : path.resolve(root) },
        this.callerParts(moduleId, filePath)
      ),
      status: 'ok',
    };
  }

  // A collapsed package id lacks the __init__ segment relative imports climb from.
  private callerParts(moduleId: ModuleId, filePath: string): string[] {
    const parts = moduleId.split('.');
    const isPackageInit = path.basename(filePath) === PACKAGE_INIT + SOURCE_EXTENSION;
    if (this.options.collapseInit && isPackageInit) {
      parts.push(PACKAGE_INIT);
    }
    return parts;
  }
}
