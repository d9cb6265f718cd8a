import { tokenize, TokenizeError, type PythonToken } from './python-tokenizer.js';

/**
 * Python keywords. A keyword on the right-hand side of an assignment is
 * never a plain name reference (`x = yield` suspends a generator).
 */
export const PYTHON_KEYWORDS: ReadonlySet<string> = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await',
  'break', 'class', 'continue', 'def', 'del', 'elif', 'else', 'except',
  'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is',
  'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try',
  'while', 'with', 'yield',
]);

/** Constructors of empty containers, which cannot have side effects */
export const EMPTY_CONSTRUCTORS: ReadonlySet<string> = new Set(['dict()', 'list()', 'set()']);

const CONSTANT_NAMES = new Set(['True', 'False', 'None']);

const SEQUENCE_CLOSERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

const IDENTIFIER_REGEX = /^[\p{L}_][\p{L}\p{N}_]*$/u;

const LAYOUT_TOKENS = new Set(['NEWLINE', 'NL', 'INDENT', 'DEDENT', 'ENDMARKER', 'COMMENT']);

function isImaginary(token: PythonToken | undefined): boolean {
  return token?.type === 'NUMBER' && /[jJ]$/.test(token.value);
}

function isFormattedString(token: PythonToken): boolean {
  const prefix = token.value.match(/^[a-zA-Z]*/)?.[0] ?? '';
  return prefix.toLowerCase().includes('f');
}

/**
 * Recursive-descent matcher over the token list.
 * Each method returns the index after the matched literal, or -1.
 */
class LiteralMatcher {
  constructor(private readonly tokens: PythonToken[]) {}

  matchAll(): boolean {
    if (this.tokens.length === 0) return false;
    const end = this.matchSequenceBody(0, undefined);
    return end === this.tokens.length;
  }

  private isOp(index: number, value: string): boolean {
    const token = this.tokens[index];
    return token !== undefined && token.type === 'OP' && token.value === value;
  }

  private matchLiteral(index: number): number {
    const token = this.tokens[index];
    if (!token) return -1;

    switch (token.type) {
      case 'STRING': {
        let next = index;
        while (this.tokens[next]?.type === 'STRING') {
          if (isFormattedString(this.tokens[next])) return -1;
          next++;
        }
        return next;
      }
      case 'NAME':
        return CONSTANT_NAMES.has(token.value) ? index + 1 : -1;
      case 'NUMBER':
        return this.matchComplexTail(index + 1, token);
      case 'OP': {
        if (token.value === '+' || token.value === '-') {
          const operand = this.tokens[index + 1];
          if (operand?.type !== 'NUMBER') return -1;
          return this.matchComplexTail(index + 2, operand);
        }
        const closer = SEQUENCE_CLOSERS[token.value];
        if (!closer) return -1;
        const end = token.value === '{'
          ? this.matchDictOrSetBody(index + 1)
          : this.matchSequenceBody(index + 1, closer);
        return end !== -1 && this.isOp(end, closer) ? end + 1 : -1;
      }
      default:
        return -1;
    }
  }

  /** `1 + 2j` and `-1 - 2j` are literals; any other arithmetic is not */
  private matchComplexTail(index: number, realPart: PythonToken): number {
    if ((this.isOp(index, '+') || this.isOp(index, '-')) && !isImaginary(realPart) && isImaginary(this.tokens[index + 1])) {
      return index + 2;
    }
    return index;
  }

  /** Comma-separated literals with an optional trailing comma */
  private matchSequenceBody(index: number, closer: string | undefined): number {
    let pos = index;
    while (pos < this.tokens.length && !(closer && this.isOp(pos, closer))) {
      const end = this.matchLiteral(pos);
      if (end === -1) return -1;
      pos = end;
      if (this.isOp(pos, ',')) {
        pos++;
      } else {
        break;
      }
    }
    return pos;
  }

  private matchDictOrSetBody(index: number): number {
    if (this.isOp(index, '}')) return index;

    const firstKey = this.matchLiteral(index);
    if (firstKey === -1) return -1;
    if (!this.isOp(firstKey, ':')) {
      return this.matchSequenceBody(index, '}');
    }

    let pos = index;
    while (!this.isOp(pos, '}')) {
      const keyEnd = this.matchLiteral(pos);
      if (keyEnd === -1 || !this.isOp(keyEnd, ':')) return -1;
      const valueEnd = this.matchLiteral(keyEnd + 1);
      if (valueEnd === -1) return -1;
      pos = valueEnd;
      if (this.isOp(pos, ',')) {
        pos++;
      } else {
        break;
      }
    }
    return pos;
  }
}

/**
 * Whether an expression is a literal in the sense of `ast.literal_eval`:
 * numbers, strings, bytes, booleans, None, and tuples, lists, sets and
 * dicts made only of those.
 */
export function isLiteral(expression: string): boolean {
  let tokens: PythonToken[];
  try {
    tokens = tokenize(expression.trim());
  } catch (error) {
    if (error instanceof TokenizeError) return false;
    throw error;
  }

  const significant = tokens.filter((token) => !LAYOUT_TOKENS.has(token.type));
  return new LiteralMatcher(significant).matchAll();
}

/**
 * Whether evaluating the expression is free of side effects: a literal,
 * a bare name, or an empty container constructor.
 */
export function isLiteralOrName(expression: string): boolean {
  if (isLiteral(expression)) return true;

  const stripped = expression.trim();
  if (EMPTY_CONSTRUCTORS.has(stripped)) return true;

  // A bare name only; dots could mean a property access
  return IDENTIFIER_REGEX.test(stripped) && !PYTHON_KEYWORDS.has(stripped);
}
