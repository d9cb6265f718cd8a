/**
 * Variable Rewriter
 *
 * Rewrites a single line that binds an unused name:
 * - `except E as e:`        -> `except E:`
 * - `x = <side-effect-free>` -> `pass`
 * - `x = <anything else>`   -> `<anything else>`, so its evaluation survives
 *
 * Every other shape is returned as is.
 */

import { isLiteralOrName } from '../parsers/python-literal.js';
import {
  EXCEPT_REGEX,
  getIndentation,
  isMultilineStatement,
  parseSimpleAssignment,
  placeholderFor,
} from './line-classifier.js';

const EXCEPT_BINDING_REGEX = / as [\p{L}\p{N}_]+:(\r?\n)?$/u;

export function rewriteVariable(line: string, previousLine: string = ''): string {
  if (line.includes('#')) return line;

  if (EXCEPT_REGEX.test(line)) {
    return line.replace(EXCEPT_BINDING_REGEX, (_match, ending: string | undefined) => `:${ending ?? ''}`);
  }

  if (isMultilineStatement(line, previousLine)) return line;

  const assignment = parseSimpleAssignment(line);
  if (!assignment) return line;

  if (isLiteralOrName(assignment.value)) {
    return placeholderFor(line);
  }

  return getIndentation(line) + assignment.value;
}
