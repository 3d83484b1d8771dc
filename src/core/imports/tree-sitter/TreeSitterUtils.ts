/**
 * Shared tree-sitter helpers for syntax tree traversal.
 */
import Parser from 'tree-sitter';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  tree: Parser.Tree;
  sourceCode: string;
}

/**
 * Parses `sourceCode`. The buffer is sized to the input so that sources over
 * the binding's default 32 KiB chunk are accepted.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  const tree = parser.parse(sourceCode, undefined, {
    bufferSize: sourceCode.length * 2 + 1,
  });
  return { tree, sourceCode };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Finds all descendant nodes matching the given types, in document order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Walks the syntax tree depth-first in document order, calling the callback
 * for each node.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  const stack: Parser.SyntaxNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    callback(current);
    const children = current.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
}

/**
 * True when the tree contains an ERROR node or a node the parser had to
 * insert (MISSING).
 */
export function containsSyntaxError(root: Parser.SyntaxNode): boolean {
  return root.hasError;
}
