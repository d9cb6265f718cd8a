/**
 * Import Rewriter
 *
 * Rewrites a single import line flagged as unused:
 * - `import a, b`         -> one line per module, checked again next pass
 * - `from x import a, b`  -> unused names dropped, the rest kept sorted
 * - `import a`            -> `pass`
 *
 * Lines that are part of a multi-line statement, and packages outside
 * the policy's eligible set, are left alone.
 */

import { FROM_IMPORT_REGEX, isMultilineImport, placeholderFor } from './line-classifier.js';
import { breakUpImport, extractPackageName, filterFromImport } from './import-rewriter.helpers.js';
import type { RewritePolicy } from './types.js';

export { RewriteInvariantError } from './import-rewriter.helpers.js';

export function rewriteImport(
  line: string,
  unusedNames: readonly string[],
  policy: RewritePolicy,
  previousLine: string = ''
): string {
  // Inline comments make the line ambiguous to rewrite
  if (line.includes('#')) return line;

  if (isMultilineImport(line, previousLine)) return line;

  const isFromImport = FROM_IMPORT_REGEX.test(line);

  if (line.includes(',') && !isFromImport) {
    return breakUpImport(line);
  }

  const packageName = extractPackageName(line);
  if (packageName === undefined) return line;

  if (!policy.removeAllUnusedImports && !policy.eligibleImportNames.has(packageName)) {
    return line;
  }

  if (line.includes(',')) {
    return filterFromImport(line, unusedNames);
  }

  return placeholderFor(line);
}
