/**
 * Python tokenizer
 *
 * A small regex-driven tokenizer covering the subset of Python's lexical
 * grammar the rewrite engine relies on: names, numbers, strings (with
 * prefixes and triple quotes), operators, comments, logical/physical
 * newlines and INDENT/DEDENT tracking.
 *
 * It never builds a tree. Callers use it to answer "does this text
 * tokenize on its own?" and to walk a token stream line by line.
 */

export type TokenType =
  | 'NAME'
  | 'NUMBER'
  | 'STRING'
  | 'OP'
  | 'COMMENT'
  | 'NEWLINE'
  | 'NL'
  | 'INDENT'
  | 'DEDENT'
  | 'ENDMARKER';

export interface PythonToken {
  type: TokenType;
  value: string;
  /** 1-based row the token starts on */
  startRow: number;
  /** 0-based column the token starts at */
  startCol: number;
  /** Physical line the token starts on, terminator included */
  line: string;
}

export class TokenizeError extends Error {
  constructor(
    message: string,
    public readonly row: number
  ) {
    super(`${message} (line ${row})`);
    this.name = 'TokenizeError';
  }
}

const NAME_REGEX = /^[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/u;

const NUMBER_REGEX = new RegExp(
  '^(?:' +
    [
      '0[xX](?:_?[0-9a-fA-F])+',
      '0[bB](?:_?[01])+',
      '0[oO](?:_?[0-7])+',
      // Floats and imaginaries before plain integers so the longest form wins
      '(?:[0-9](?:_?[0-9])*\\.(?:[0-9](?:_?[0-9])*)?|\\.[0-9](?:_?[0-9])*)(?:[eE][-+]?[0-9](?:_?[0-9])*)?[jJ]?',
      '[0-9](?:_?[0-9])*[eE][-+]?[0-9](?:_?[0-9])*[jJ]?',
      '[0-9](?:_?[0-9])*[jJ]',
      '[0-9](?:_?[0-9])*',
    ].join('|') +
    ')'
);

const STRING_START_REGEX = /^([a-zA-Z]{0,2})('''|"""|'|")/;

const STRING_PREFIXES = new Set([
  '', 'r', 'u', 'f', 'b', 'br', 'rb', 'fr', 'rf',
]);

const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '->', ':=', '!=', '==', '<=', '>=', '**', '//', '<<', '>>',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
  '+', '-', '*', '/', '%', '&', '|', '^', '~', '<', '>',
  '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=', '@', '!',
];

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);

const TAB_SIZE = 8;

/**
 * Split text into physical lines, each keeping its terminator.
 * Only `\n` ends a line, so `\r\n` stays attached as a whole.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function isLineBreak(char: string | undefined): boolean {
  return char === '\n' || char === '\r';
}

/**
 * Find the index just past the closing quote of a string body that begins
 * at `from`, or -1 when the quote is not closed on this text.
 */
function findStringEnd(text: string, from: number, quote: string): number {
  let i = from;
  while (i < text.length) {
    const char = text[i];
    if (char === '\\') {
      i += 2;
      continue;
    }
    if (text.startsWith(quote, i)) {
      return i + quote.length;
    }
    if (quote.length === 1 && isLineBreak(char)) {
      return -1;
    }
    i++;
  }
  return -1;
}

/** A single-quoted string may continue onto the next line only after a backslash */
function endsWithLineContinuation(text: string): boolean {
  return /\\\r?\n$/.test(text);
}

function measureIndent(line: string): { column: number; end: number } {
  let column = 0;
  let end = 0;
  while (end < line.length) {
    const char = line[end];
    if (char === ' ') {
      column++;
    } else if (char === '\t') {
      column = (Math.floor(column / TAB_SIZE) + 1) * TAB_SIZE;
    } else if (char === '\f') {
      column = 0;
    } else {
      break;
    }
    end++;
  }
  return { column, end };
}

interface PendingString {
  quote: string;
  text: string;
  startRow: number;
  startCol: number;
  line: string;
}

/**
 * Tokenize Python source.
 *
 * @throws TokenizeError when the text cannot be tokenized
 */
export function tokenize(source: string): PythonToken[] {
  const tokens: PythonToken[] = [];
  const lines = splitLines(source);
  const indents = [0];
  const brackets: string[] = [];
  let continued = false;
  let pending: PendingString | null = null;

  const push = (type: TokenType, value: string, startRow: number, startCol: number, line: string): void => {
    tokens.push({ type, value, startRow, startCol, line });
  };

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const row = index + 1;
    let pos = 0;
    let sawToken = false;

    if (pending) {
      const end = findStringEnd(line, 0, pending.quote);
      if (end === -1) {
        if (pending.quote.length === 1 && !endsWithLineContinuation(line)) {
          throw new TokenizeError('unterminated string literal', pending.startRow);
        }
        pending.text += line;
        continue;
      }
      push('STRING', pending.text + line.slice(0, end), pending.startRow, pending.startCol, pending.line);
      pos = end;
      pending = null;
      sawToken = true;
    } else if (brackets.length === 0 && !continued) {
      const { column, end } = measureIndent(line);
      pos = end;

      if (pos === line.length) {
        continue;
      }

      if (line[pos] === '#') {
        const comment = line.slice(pos).replace(/\r?\n$/, '');
        push('COMMENT', comment, row, pos, line);
        push('NL', line.slice(pos + comment.length), row, pos + comment.length, line);
        continue;
      }

      if (isLineBreak(line[pos])) {
        push('NL', line.slice(pos), row, pos, line);
        continue;
      }

      if (column > indents[indents.length - 1]) {
        indents.push(column);
        push('INDENT', line.slice(0, pos), row, 0, line);
      }

      while (column < indents[indents.length - 1]) {
        indents.pop();
        if (!indents.includes(column)) {
          throw new TokenizeError('unindent does not match any outer indentation level', row);
        }
        push('DEDENT', '', row, pos, line);
      }
    } else {
      continued = false;
    }

    while (pos < line.length) {
      while (line[pos] === ' ' || line[pos] === '\t' || line[pos] === '\f') {
        pos++;
      }
      if (pos >= line.length) break;

      const char = line[pos];
      const rest = line.slice(pos);

      if (char === '#') {
        const comment = rest.replace(/\r?\n$/, '');
        push('COMMENT', comment, row, pos, line);
        pos += comment.length;
        continue;
      }

      if (isLineBreak(char)) {
        const type: TokenType = brackets.length > 0 || !sawToken ? 'NL' : 'NEWLINE';
        push(type, rest, row, pos, line);
        pos = line.length;
        break;
      }

      if (char === '\\') {
        if (!/^\\\r?\n$/.test(rest)) {
          throw new TokenizeError('unexpected character after line continuation character', row);
        }
        continued = true;
        pos = line.length;
        break;
      }

      const number = rest.match(NUMBER_REGEX);
      if (number && (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(rest[1] ?? '')))) {
        push('NUMBER', number[0], row, pos, line);
        pos += number[0].length;
        sawToken = true;
        continue;
      }

      const stringStart = rest.match(STRING_START_REGEX);
      if (stringStart && STRING_PREFIXES.has(stringStart[1].toLowerCase())) {
        const quote = stringStart[2];
        const bodyStart = pos + stringStart[0].length;
        const end = findStringEnd(line, bodyStart, quote);
        if (end === -1) {
          if (quote.length === 1 && !endsWithLineContinuation(line)) {
            throw new TokenizeError('unterminated string literal', row);
          }
          pending = { quote, text: rest, startRow: row, startCol: pos, line };
          pos = line.length;
          break;
        }
        push('STRING', line.slice(pos, end), row, pos, line);
        pos = end;
        sawToken = true;
        continue;
      }

      const name = rest.match(NAME_REGEX);
      if (name) {
        push('NAME', name[0], row, pos, line);
        pos += name[0].length;
        sawToken = true;
        continue;
      }

      const operator = OPERATORS.find((op) => rest.startsWith(op));
      if (operator) {
        if (operator in OPENERS) {
          brackets.push(OPENERS[operator]);
        } else if (CLOSERS.has(operator)) {
          if (brackets.pop() !== operator) {
            throw new TokenizeError(`unmatched '${operator}'`, row);
          }
        }
        push('OP', operator, row, pos, line);
        pos += operator.length;
        sawToken = true;
        continue;
      }

      throw new TokenizeError(`invalid character '${char}'`, row);
    }

    // Unterminated last line still closes its logical line
    if (index === lines.length - 1 && !pending && !continued && brackets.length === 0 && sawToken && !isLineBreak(line[line.length - 1])) {
      push('NEWLINE', '', row, line.length, line);
    }
  }

  const lastRow = lines.length + 1;

  if (pending) {
    throw new TokenizeError('EOF in multi-line string', pending.startRow);
  }
  if (brackets.length > 0 || continued) {
    throw new TokenizeError('EOF in multi-line statement', lastRow);
  }

  for (let i = indents.length - 1; i > 0; i--) {
    push('DEDENT', '', lastRow, 0, '');
  }
  push('ENDMARKER', '', lastRow, 0, '');

  return tokens;
}

/**
 * Whether the text tokenizes on its own
 */
export function canTokenize(source: string): boolean {
  try {
    tokenize(source);
    return true;
  } catch (error) {
    if (error instanceof TokenizeError) return false;
    throw error;
  }
}
