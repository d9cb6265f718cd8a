/**
 * Pyflakes adapter
 *
 * Runs pyflakes over a source text (fed on stdin) and turns its report
 * into diagnostics. The rewrite engine never calls this directly; it is
 * handed over as a `DiagnosticSource`.
 */

import { spawnSync } from 'node:child_process';
import type { Diagnostic, DiagnosticSource } from '../refactor/types.js';

export interface AnalyzerConfig {
  /** Executable to run */
  command: string;
  /** Arguments; the source is written to stdin */
  args: string[];
  /** Kill the analyzer after this many milliseconds */
  timeout?: number;
}

export const DEFAULT_ANALYZER: AnalyzerConfig = {
  command: 'python3',
  args: ['-m', 'pyflakes'],
};

export class AnalyzerError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AnalyzerError';
  }
}

// <file>:<line>:[<col>:] <message>
const REPORT_LINE_REGEX = /^.*?:(\d+):(?:\d+:)?\s*(.*)$/;
const UNUSED_IMPORT_REGEX = /^'(.+?)' imported but unused/;
const UNUSED_VARIABLE_REGEX = /^local variable '(.+?)' is assigned to but never used/;

/**
 * Parse a pyflakes report. Lines that are not unused-import or
 * unused-variable messages are ignored.
 */
export function parsePyflakesOutput(output: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const match = REPORT_LINE_REGEX.exec(rawLine);
    if (!match) continue;

    const line = parseInt(match[1], 10);
    const message = match[2];

    const unusedImport = UNUSED_IMPORT_REGEX.exec(message);
    if (unusedImport) {
      diagnostics.push({ kind: 'unused-import', line, symbol: unusedImport[1] });
      continue;
    }

    const unusedVariable = UNUSED_VARIABLE_REGEX.exec(message);
    if (unusedVariable) {
      diagnostics.push({ kind: 'unused-variable', line, symbol: unusedVariable[1] });
    }
  }

  return diagnostics;
}

function runAnalyzer(source: string, config: AnalyzerConfig): string {
  const result = spawnSync(config.command, config.args, {
    input: source,
    encoding: 'utf-8',
    timeout: config.timeout,
    maxBuffer: 64 * 1024 * 1024,
  });

  if (result.error) {
    throw new AnalyzerError(
      `Failed to run ${config.command}: ${result.error.message}`,
      config.command,
      result.error
    );
  }

  // pyflakes exits 1 whenever it reports anything; only stdout matters
  return result.stdout;
}

/**
 * Create a diagnostic source backed by pyflakes
 */
export function createPyflakesSource(config: AnalyzerConfig = DEFAULT_ANALYZER): DiagnosticSource {
  return (source: string): Diagnostic[] => {
    const diagnostics = parsePyflakesOutput(runAnalyzer(source, config));

    // pyflakes misreports variables captured by `nonlocal`
    if (source.includes('nonlocal')) {
      return diagnostics.filter((diagnostic) => diagnostic.kind !== 'unused-variable');
    }

    return diagnostics;
  };
}

/**
 * Check that the analyzer can be started at all
 */
export function checkAnalyzerAvailable(config: AnalyzerConfig = DEFAULT_ANALYZER): void {
  const result = spawnSync(config.command, [...config.args, '--version'], {
    encoding: 'utf-8',
    timeout: config.timeout,
  });

  if (result.error) {
    throw new AnalyzerError(
      `Analyzer "${config.command}" could not be started: ${result.error.message}`,
      config.command,
      result.error
    );
  }
  if (result.status !== 0) {
    const detail = result.stderr.trim() || `exit code ${result.status}`;
    throw new AnalyzerError(`Analyzer "${config.command}" is not usable: ${detail}`, config.command);
  }
}
