import { FROM_IMPORT_REGEX, getLineEnding, placeholderFor } from './line-classifier.js';

/**
 * Raised when a helper sees input its caller promised it would never
 * pass. Always a classifier bug, never a user error.
 */
export class RewriteInvariantError extends Error {
  constructor(message: string, public readonly line: string) {
    super(`${message}: ${JSON.stringify(line)}`);
    this.name = 'RewriteInvariantError';
  }
}

function assertNoneOf(line: string, symbols: string[]): void {
  for (const symbol of symbols) {
    if (line.includes(symbol)) {
      throw new RewriteInvariantError(`unexpected '${symbol}' in single-line import`, line);
    }
  }
}

/** Split at the first standalone `import` keyword */
function splitAtImportKeyword(line: string): { head: string; names: string } {
  const match = /\bimport\b/.exec(line);
  if (!match) {
    throw new RewriteInvariantError('missing import keyword', line);
  }
  return {
    head: line.slice(0, match.index),
    names: line.slice(match.index + match[0].length),
  };
}

/**
 * Top-level package of an import statement: `a` for `import a.b` and
 * `from a.b import c`, an empty string for a relative import. Undefined
 * when the line is not an import statement.
 */
export function extractPackageName(line: string): string | undefined {
  assertNoneOf(line, ['\\', '(', ')', ';']);

  if (!/^\s*(import|from)\s/.test(line)) return undefined;

  const word = line.trim().split(/\s+/)[1] ?? '';
  const packageName = word.split('.')[0];
  if (/\s/.test(packageName)) {
    throw new RewriteInvariantError('package name contains whitespace', line);
  }

  return packageName;
}

/**
 * Rewrite `import a, b` as one `import` line per module, sorted.
 * An unterminated line is returned unchanged.
 */
export function breakUpImport(line: string): string {
  assertNoneOf(line, ['\\', '(', ')', ';', '#']);
  if (FROM_IMPORT_REGEX.test(line)) {
    throw new RewriteInvariantError('cannot break up a from-import', line);
  }

  const ending = getLineEnding(line);
  if (!ending.includes('\n')) return line;

  const { head, names } = splitAtImportKeyword(line);
  const prefix = `${head}import `;

  return names
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean)
    .sort()
    .map((name) => prefix + name + ending)
    .join('');
}

/**
 * Drop the unused entries from `from X import a, b, c`.
 *
 * Entries match either in the qualified form an analyzer reports
 * (`X.a`, `X.b as c`) or as written. Returns the line unchanged when
 * nothing matched, and `pass` when nothing is left.
 */
export function filterFromImport(line: string, unusedNames: readonly string[]): string {
  assertNoneOf(line, ['\\', '(', ')', ';', '#']);

  const { head, names } = splitAtImportKeyword(line);
  const baseModule = /\bfrom\s+(\S+)/.exec(head)?.[1];
  if (baseModule === undefined) {
    throw new RewriteInvariantError('missing module in from-import', line);
  }

  const unused = new Set(unusedNames);
  const entries = names.trim().split(',').map((entry) => entry.trim());
  const kept = entries.filter((entry) => !unused.has(`${baseModule}.${entry}`) && !unused.has(entry));

  if (kept.length === entries.length) return line;

  if (kept.length === 0) {
    return placeholderFor(line);
  }

  return `${head}import ${kept.sort().join(', ')}${getLineEnding(line)}`;
}
