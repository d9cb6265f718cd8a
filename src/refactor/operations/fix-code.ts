/**
 * Fix code - run diagnose -> rewrite -> compact until the text settles
 *
 * Each pass asks the analyzer about the current text, rewrites only the
 * flagged lines, then drops placeholders that became redundant. Line
 * numbers from one pass are never applied to the text of another.
 */

import { splitLines } from '../../parsers/python-tokenizer.js';
import { classifyLine } from '../line-classifier.js';
import { rewriteImport } from '../import-rewriter.js';
import { rewriteVariable } from '../variable-rewriter.js';
import { compactPasses } from '../pass-compactor.js';
import type {
  Diagnostic,
  FixCodeOptions,
  FixCodeResult,
  LineRole,
  RewritePolicy,
} from '../types.js';

export const DEFAULT_MAX_ITERATIONS = 100;

interface LineDiagnostics {
  /** Unused symbols reported per import line */
  imports: Map<number, string[]>;
  variables: Set<number>;
}

function groupByLine(diagnostics: readonly Diagnostic[], policy: RewritePolicy): LineDiagnostics {
  const imports = new Map<number, string[]>();
  const variables = new Set<number>();

  for (const diagnostic of diagnostics) {
    if (diagnostic.kind === 'unused-import') {
      const symbols = imports.get(diagnostic.line) ?? [];
      if (diagnostic.symbol !== undefined) symbols.push(diagnostic.symbol);
      imports.set(diagnostic.line, symbols);
    } else if (policy.removeUnusedVariables) {
      variables.add(diagnostic.line);
    }
  }

  return { imports, variables };
}

function rewriteFlaggedLine(
  line: string,
  role: LineRole,
  unusedNames: readonly string[] | undefined,
  removeVariable: boolean,
  policy: RewritePolicy,
  previousLine: string
): string {
  if (unusedNames !== undefined) {
    return role === 'plain-import' || role === 'from-import'
      ? rewriteImport(line, unusedNames, policy, previousLine)
      : line;
  }

  if (removeVariable && (role === 'assignment' || role === 'except-binding')) {
    return rewriteVariable(line, previousLine);
  }

  return line;
}

/**
 * One rewrite pass over the lines flagged by `diagnostics`, which must
 * have been computed from this exact `source`. Only import lines take an
 * import rewrite and only assignments or `except ... as` lines take a
 * variable rewrite; comments and continuation lines pass through.
 */
export function filterCode(source: string, diagnostics: readonly Diagnostic[], policy: RewritePolicy): string {
  const { imports, variables } = groupByLine(diagnostics, policy);
  const output: string[] = [];
  let previousLine = '';

  splitLines(source).forEach((line, index) => {
    const lineNumber = index + 1;
    const unusedNames = imports.get(lineNumber);
    const removeVariable = variables.has(lineNumber);

    if (unusedNames === undefined && !removeVariable) {
      output.push(line);
    } else {
      const role = classifyLine(line, previousLine);
      output.push(rewriteFlaggedLine(line, role, unusedNames, removeVariable, policy, previousLine));
    }

    previousLine = line;
  });

  return output.join('');
}

function diagnoseSafely(source: string, options: FixCodeOptions): Diagnostic[] {
  try {
    return options.diagnose(source);
  } catch (error) {
    options.onAnalyzerError?.(error);
    return [];
  }
}

/**
 * Iterate until a pass leaves the text unchanged or `maxIterations`
 * passes have run.
 */
export function runFixedPoint(source: string, options: FixCodeOptions): FixCodeResult {
  if (!source) {
    return { source, iterations: 0, converged: true };
  }

  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  let current = source;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const diagnostics = diagnoseSafely(current, options);
    const filtered = compactPasses(filterCode(current, diagnostics, options.policy));

    if (filtered === current) {
      return { source: current, iterations: iteration, converged: true };
    }
    current = filtered;
  }

  return { source: current, iterations: maxIterations, converged: false };
}

/**
 * Return the source with unused imports and variables removed
 */
export function fixCode(source: string, options: FixCodeOptions): string {
  return runFixedPoint(source, options).source;
}
