/**
 * Line Classifier
 *
 * Decides, from a line and the line before it, what a physical line is.
 * Everything here is line-local: no parse tree, only regexes and a
 * standalone tokenize check.
 */

import { canTokenize } from '../parsers/python-tokenizer.js';
import type { LineRole, SimpleAssignment } from './types.js';

export const EXCEPT_REGEX = /^\s*except [\s,()\p{L}\p{N}_]+ as [\p{L}\p{N}_]+:\r?\n?$/u;
export const FROM_IMPORT_REGEX = /^\s*from\s/;
export const PLAIN_IMPORT_REGEX = /^\s*import\s/;

const IDENTIFIER_REGEX = /^[\p{L}_][\p{L}\p{N}_]*$/u;

// A `=` preceded by one of these is a comparison or an augmented assignment
const OPERATOR_BEFORE_EQUALS = new Set(['+', '-', '*', '/', '%', '&', '|', '^', '<', '>', '@', '!', ':', '=']);

/**
 * Leading whitespace, or an empty string for a blank line
 */
export function getIndentation(line: string): string {
  if (!line.trim()) return '';
  return line.slice(0, line.length - line.trimStart().length);
}

/**
 * Trailing whitespace including the terminator; empty for an
 * unterminated line with no trailing blanks
 */
export function getLineEnding(line: string): string {
  return line.slice(line.trimEnd().length);
}

/**
 * A `pass` statement standing in for the given line, keeping its
 * indentation and line ending so an enclosing block never ends up empty
 */
export function placeholderFor(line: string): string {
  return `${getIndentation(line)}pass${getLineEnding(line)}`;
}

/**
 * Whether the line is part of a statement spanning several lines, or is
 * otherwise unsafe to treat as a complete statement on its own
 */
export function isMultilineStatement(line: string, previousLine: string = ''): boolean {
  for (const symbol of ['\\', ':', ';']) {
    if (line.includes(symbol)) return true;
  }

  if (!canTokenize(line)) return true;

  return previousLine.trimEnd().endsWith('\\');
}

/**
 * Whether an import line is part of a parenthesized or continued import
 */
export function isMultilineImport(line: string, previousLine: string = ''): boolean {
  if (line.includes('(') || line.includes(')')) return true;

  // Doctest prompt
  if (line.trimStart().startsWith('>')) return true;

  return isMultilineStatement(line, previousLine);
}

/**
 * Split `name = expression` at its single `=`. Returns undefined for
 * chained, augmented, destructuring or attribute/subscript assignments.
 */
export function parseSimpleAssignment(line: string): SimpleAssignment | undefined {
  const index = line.indexOf('=');
  if (index === -1 || line.indexOf('=', index + 1) !== -1) return undefined;

  if (OPERATOR_BEFORE_EQUALS.has(line[index - 1] ?? '')) return undefined;

  const target = line.slice(0, index).trim();
  if (!IDENTIFIER_REGEX.test(target)) return undefined;

  return { target, value: line.slice(index + 1).trimStart() };
}

export function classifyLine(line: string, previousLine: string = ''): LineRole {
  if (line.includes('#')) return 'comment';
  if (EXCEPT_REGEX.test(line)) return 'except-binding';

  if (FROM_IMPORT_REGEX.test(line)) {
    return isMultilineImport(line, previousLine) ? 'continuation' : 'from-import';
  }
  if (PLAIN_IMPORT_REGEX.test(line)) {
    return isMultilineImport(line, previousLine) ? 'continuation' : 'plain-import';
  }

  if (isMultilineStatement(line, previousLine)) return 'continuation';
  if (parseSimpleAssignment(line)) return 'assignment';

  return 'other';
}
