import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_ANALYZER, type AnalyzerConfig } from './analyzer.js';
import { DEFAULT_MAX_ITERATIONS } from '../refactor/operations/fix-code.js';

// ============================================================================
// Schema
// ============================================================================

export const UnflakeConfigSchema = z
  .object({
    // Extra modules whose unused imports may be removed
    imports: z.array(z.string().min(1)).optional(),
    removeAllUnusedImports: z.boolean().optional(),
    removeUnusedVariables: z.boolean().optional(),
    // Directory names or glob patterns skipped by --recursive
    exclude: z.array(z.string()).optional(),
    maxIterations: z.number().int().positive().optional(),
    analyzer: z
      .object({
        command: z.string().min(1).optional(),
        args: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type UnflakeConfig = z.infer<typeof UnflakeConfigSchema>;

// ============================================================================
// Error Types
// ============================================================================

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

// ============================================================================
// Loading
// ============================================================================

export const CONFIG_FILES = ['.unflakerc', '.unflakerc.json', 'unflake.config.json'];

/**
 * Read and validate a single config file
 *
 * @throws ConfigLoadError when the file cannot be read or is not JSON
 * @throws ConfigValidationError when the content does not match the schema
 */
export function readConfigFile(configPath: string): UnflakeConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse ${path.basename(configPath)}`, configPath, error);
  }

  const result = UnflakeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid ${path.basename(configPath)}: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      configPath,
      issues
    );
  }

  return result.data;
}

/**
 * Load the first config file found in `rootDir`. A broken file is
 * reported and treated as no config.
 */
export function loadProjectConfig(rootDir: string): UnflakeConfig {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(rootDir, configFile);
    if (fs.existsSync(configPath)) {
      try {
        return readConfigFile(configPath);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Warning: ${message}`);
        return {};
      }
    }
  }

  return {};
}

// ============================================================================
// Effective Settings
// ============================================================================

/** Flags given on the command line; they win over the config file */
export interface CliOverrides {
  imports?: string[];
  removeAllUnusedImports?: boolean;
  removeUnusedVariables?: boolean;
}

export interface UnflakeSettings {
  imports: string[];
  removeAllUnusedImports: boolean;
  removeUnusedVariables: boolean;
  exclude: string[];
  maxIterations: number;
  analyzer: AnalyzerConfig;
}

/**
 * Combine defaults, global analyzer settings, the project config and
 * command-line flags, later ones taking precedence
 */
export function mergeWithDefaults(
  config: UnflakeConfig,
  cli: CliOverrides = {},
  globalAnalyzer: Partial<AnalyzerConfig> = {}
): UnflakeSettings {
  return {
    imports: [...(config.imports || []), ...(cli.imports || [])],
    removeAllUnusedImports: cli.removeAllUnusedImports || config.removeAllUnusedImports || false,
    removeUnusedVariables: cli.removeUnusedVariables || config.removeUnusedVariables || false,
    exclude: config.exclude || [],
    maxIterations: config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    analyzer: {
      command: config.analyzer?.command ?? globalAnalyzer.command ?? DEFAULT_ANALYZER.command,
      args: config.analyzer?.args ?? globalAnalyzer.args ?? DEFAULT_ANALYZER.args,
    },
  };
}

/**
 * Split a comma-separated module list as given to `--imports`
 */
export function parseImportList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
}
