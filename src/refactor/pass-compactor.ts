/**
 * Pass Compactor
 *
 * Removes `pass` placeholders that no longer hold a block open. A `pass`
 * that is the only statement of its block, or the last line of the
 * file, always stays.
 */

import { splitLines, tokenize, TokenizeError, type PythonToken, type TokenType } from '../parsers/python-tokenizer.js';
import { getIndentation } from './line-classifier.js';

const ATOMS: ReadonlySet<TokenType> = new Set(['NAME', 'NUMBER', 'STRING']);
const REAL_TOKENS: ReadonlySet<TokenType> = new Set(['NAME', 'NUMBER', 'STRING', 'OP']);

function isPlaceholder(token: PythonToken): boolean {
  return token.type === 'NAME' && token.line.trim() === 'pass';
}

/**
 * 1-based numbers of the `pass` lines that can be deleted.
 *
 * @throws TokenizeError when the source does not tokenize
 */
export function uselessPassLineNumbers(source: string): number[] {
  const tokens = tokenize(source);
  const marked = new Set<number>();

  // First statement-bearing token of every row
  const firstRealTokenByRow = new Map<number, PythonToken>();
  for (const token of tokens) {
    if (REAL_TOKENS.has(token.type) && !firstRealTokenByRow.has(token.startRow)) {
      firstRealTokenByRow.set(token.startRow, token);
    }
  }

  let previousType: TokenType | undefined;
  let previousLine = '';
  let lastPassRow: number | undefined;
  let lastPassIndentation: string | undefined;

  for (const token of tokens) {
    const row = token.startRow;
    const isPass = isPlaceholder(token);

    // Leading: an atom right below a `pass` at the same depth already fills the block
    if (
      lastPassRow !== undefined &&
      row - 1 === lastPassRow &&
      getIndentation(token.line) === lastPassIndentation &&
      ATOMS.has(token.type) &&
      !isPass
    ) {
      marked.add(lastPassRow);
    }

    if (isPass) {
      lastPassRow = row;
      lastPassIndentation = getIndentation(token.line);

      // Trailing: not the first statement of its block, and more follows at the same depth
      const next = firstRealTokenByRow.get(row + 1);
      if (
        previousType !== 'INDENT' &&
        !previousLine.trimEnd().endsWith('\\') &&
        next !== undefined &&
        getIndentation(next.line) === lastPassIndentation
      ) {
        marked.add(row);
      }
    }

    previousType = token.type;
    previousLine = token.line;
  }

  return [...marked].sort((a, b) => a - b);
}

/**
 * Delete redundant `pass` lines. Source that does not tokenize comes
 * back unchanged.
 */
export function compactPasses(source: string): string {
  let marked: ReadonlySet<number>;
  try {
    marked = new Set(uselessPassLineNumbers(source));
  } catch (error) {
    if (error instanceof TokenizeError) return source;
    throw error;
  }

  if (marked.size === 0) return source;

  return splitLines(source)
    .filter((_line, index) => !marked.has(index + 1))
    .join('');
}
