export { ImportExtractor } from './extractor.js';
export type { ExtractOutcome, ExtractStatus, ImportExtractorOptions } from './extractor.js';
export { resolveImportEdges, probeName } from './resolver.js';
export { createPythonParser, parsePythonImports } from './tree-sitter/python-imports.js';
export type {
  ImportStatement,
  PlainImport,
  FromImport,
  ParseOptions,
  ResolveContext,
  FileExists,
} from './types.js';
