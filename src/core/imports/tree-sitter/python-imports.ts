/**
 * Python import statement extraction using tree-sitter.
 */
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { ImportStatement, ParseOptions } from '../types.js';
import {
  containsSyntaxError,
  createContext,
  findNodesOfType,
  getNodeText,
} from './TreeSitterUtils.js';

/** Python tree-sitter node types for imports */
const PyImportNodes = {
  IMPORT_STATEMENT: 'import_statement',
  IMPORT_FROM_STATEMENT: 'import_from_statement',
  FUTURE_IMPORT_STATEMENT: 'future_import_statement',
  ALIASED_IMPORT: 'aliased_import',
  DOTTED_NAME: 'dotted_name',
  RELATIVE_IMPORT: 'relative_import',
  IMPORT_PREFIX: 'import_prefix',
  WILDCARD_IMPORT: 'wildcard_import',
  IMPORT: 'import',
} as const;

const FUTURE_MODULE = '__future__';

/**
 * Creates a Python parser instance.
 *
 * Note: The type assertion `as unknown as Parser.Language` is required because
 * tree-sitter-python's TypeScript definitions don't extend tree-sitter's
 * Language type, despite being compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/**
 * Extracts every import statement of a Python module, at any nesting depth.
 *
 * Returns null when the source does not parse cleanly and the policy is
 * `skip` (the default), or when the parser itself throws.
 */
export function parsePythonImports(
  parser: Parser,
  sourceCode: string,
  options: ParseOptions = {}
): ImportStatement[] | null {
  const policy = options.syntaxErrors ?? 'skip';

  let root: Parser.SyntaxNode;
  try {
    root = createContext(parser, sourceCode).tree.rootNode;
  } catch {
    return null;
  }

  if (policy === 'skip' && containsSyntaxError(root)) {
    return null;
  }

  const statements: ImportStatement[] = [];
  const nodes = findNodesOfType(root, [
    PyImportNodes.IMPORT_STATEMENT,
    PyImportNodes.IMPORT_FROM_STATEMENT,
    PyImportNodes.FUTURE_IMPORT_STATEMENT,
  ]);

  for (const node of nodes) {
    const statement =
      node.type === PyImportNodes.IMPORT_STATEMENT
        ? readPlainImport(node, sourceCode)
        : readFromImport(node, sourceCode);
    if (statement) statements.push(statement);
  }

  return statements;
}

// import_statement: import dotted_name [as alias], ...
function readPlainImport(
  node: Parser.SyntaxNode,
  sourceCode: string
): ImportStatement | null {
  const names: string[] = [];
  for (const child of node.namedChildren) {
    const dotted = moduleNameOf(child);
    if (dotted) names.push(dottedText(dotted, sourceCode));
  }
  return names.length > 0 ? { kind: 'import', names } : null;
}

// import_from_statement: from (relative_import | dotted_name) import (names | *)
// future_import_statement: from __future__ import names
function readFromImport(
  node: Parser.SyntaxNode,
  sourceCode: string
): ImportStatement | null {
  let level = 0;
  let module: string | null =
    node.type === PyImportNodes.FUTURE_IMPORT_STATEMENT ? FUTURE_MODULE : null;
  let foundImportKeyword = false;
  const names: string[] = [];

  for (const child of node.children) {
    if (child.type === PyImportNodes.IMPORT) {
      foundImportKeyword = true;
      continue;
    }

    if (!foundImportKeyword) {
      if (child.type === PyImportNodes.DOTTED_NAME) {
        module = dottedText(child, sourceCode);
      } else if (child.type === PyImportNodes.RELATIVE_IMPORT) {
        ({ level, module } = readRelative(child, sourceCode));
      }
      continue;
    }

    if (child.type === PyImportNodes.WILDCARD_IMPORT) {
      names.push('*');
      continue;
    }
    const dotted = moduleNameOf(child);
    if (dotted) names.push(dottedText(dotted, sourceCode));
  }

  if (level === 0 && !module) return null;
  return { kind: 'from', level, module, names };
}

function readRelative(
  node: Parser.SyntaxNode,
  sourceCode: string
): { level: number; module: string | null } {
  let level = 0;
  let module: string | null = null;
  for (const child of node.children) {
    if (child.type === PyImportNodes.IMPORT_PREFIX) {
      level = getNodeText(child, sourceCode).split('').filter((c) => c === '.').length;
    } else if (child.type === PyImportNodes.DOTTED_NAME) {
      module = dottedText(child, sourceCode);
    }
  }
  return { level, module };
}

/** The dotted_name of a bare or aliased import clause. */
function moduleNameOf(node: Parser.SyntaxNode): Parser.SyntaxNode | null {
  if (node.type === PyImportNodes.DOTTED_NAME) return node;
  if (node.type === PyImportNodes.ALIASED_IMPORT) {
    return node.namedChildren.find((c) => c.type === PyImportNodes.DOTTED_NAME) ?? null;
  }
  return null;
}

// `a . b` is legal Python; identifiers never contain whitespace.
function dottedText(node: Parser.SyntaxNode, sourceCode: string): string {
  return getNodeText(node, sourceCode).replace(/\s+/g, '');
}
