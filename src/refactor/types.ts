// ============================================================================
// Diagnostic Types
// ============================================================================

/** What a diagnostic reports as unused */
export type DiagnosticKind = 'unused-import' | 'unused-variable';

/** An unused import or unused local binding reported by an analyzer */
export interface Diagnostic {
  kind: DiagnosticKind;
  /** 1-based line number, valid only against the text it was computed from */
  line: number;
  /**
   * Name as reported: `os.path` for `import os.path`,
   * `a.c` or `a.c as d` for `from a import c as d`
   */
  symbol?: string;
}

/** Produces diagnostics for a source text */
export type DiagnosticSource = (source: string) => Diagnostic[];

// ============================================================================
// Line Classification Types
// ============================================================================

/** Role of a single physical line, derived on demand */
export type LineRole =
  | 'comment'
  | 'continuation'
  | 'plain-import'
  | 'from-import'
  | 'assignment'
  | 'except-binding'
  | 'other';

/** A single-target assignment split at its `=` */
export interface SimpleAssignment {
  /** Bound name */
  target: string;
  /** Right-hand side with leading whitespace removed, line ending kept */
  value: string;
}

// ============================================================================
// Rewrite Policy Types
// ============================================================================

/** What the rewriters are allowed to remove */
export interface RewritePolicy {
  /** Top-level packages whose unused imports may be removed */
  eligibleImportNames: ReadonlySet<string>;
  /** Remove unused imports regardless of `eligibleImportNames` */
  removeAllUnusedImports: boolean;
  /** Act on unused-variable diagnostics */
  removeUnusedVariables: boolean;
}

// ============================================================================
// Fixed-Point Types
// ============================================================================

export interface FixCodeOptions {
  /** Analyzer invoked on every iteration */
  diagnose: DiagnosticSource;
  policy: RewritePolicy;
  /** Upper bound on diagnose/rewrite/compact passes */
  maxIterations?: number;
  /** Called when `diagnose` throws; the pass then proceeds with no diagnostics */
  onAnalyzerError?: (error: unknown) => void;
}

export interface FixCodeResult {
  /** Rewritten text */
  source: string;
  /** Number of passes run, including the one that confirmed stability */
  iterations: number;
  /** False when `maxIterations` was reached before the text stopped changing */
  converged: boolean;
}
