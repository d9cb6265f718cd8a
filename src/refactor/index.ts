/**
 * Refactoring Module
 *
 * Removes unused imports and unused variables from Python source,
 * one flagged line at a time, until the analyzer has nothing left to report.
 */

// Core types from types.ts
export type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSource,
  LineRole,
  SimpleAssignment,
  RewritePolicy,
  FixCodeOptions,
  FixCodeResult,
} from './types.js';

// Line classification
export {
  classifyLine,
  getIndentation,
  getLineEnding,
  placeholderFor,
  isMultilineImport,
  isMultilineStatement,
  parseSimpleAssignment,
} from './line-classifier.js';

// Rewriters
export { rewriteImport, RewriteInvariantError } from './import-rewriter.js';
export { breakUpImport, extractPackageName, filterFromImport } from './import-rewriter.helpers.js';
export { rewriteVariable } from './variable-rewriter.js';
export { compactPasses, uselessPassLineNumbers } from './pass-compactor.js';

// Operations
export * from './operations/index.js';

// Safe-import registry
export * from '../registry/index.js';

// Python tokens and literals
export { tokenize, canTokenize, splitLines, TokenizeError, isLiteral, isLiteralOrName } from '../parsers/index.js';
export type { PythonToken, TokenType } from '../parsers/index.js';
