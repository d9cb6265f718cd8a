// Core exports
export {
  createPyflakesSource,
  parsePyflakesOutput,
  checkAnalyzerAvailable,
  AnalyzerError,
  DEFAULT_ANALYZER,
} from './analyzer.js';
export type { AnalyzerConfig } from './analyzer.js';
export {
  loadProjectConfig,
  readConfigFile,
  mergeWithDefaults,
  parseImportList,
  ConfigLoadError,
  ConfigValidationError,
  UnflakeConfigSchema,
  CONFIG_FILES,
} from './config.js';
export type { UnflakeConfig, UnflakeSettings, CliOverrides } from './config.js';
export { detectEncoding, findCodingCookie, readSourceFile, writeSourceFile } from './encoding.js';
export type { SourceEncoding, SourceFile } from './encoding.js';
export { collectPythonFiles } from './files.js';
export type { CollectOptions } from './files.js';

import { createSafeImportRegistry } from '../registry/index.js';
import type { RewritePolicy } from '../refactor/types.js';
import type { UnflakeSettings } from './config.js';

/**
 * Build the rewrite policy for the effective settings. The safe-import
 * registry is created here once and shared by every file of the run.
 */
export function createConfiguredPolicy(settings: UnflakeSettings): RewritePolicy {
  const registry = createSafeImportRegistry({ additionalImports: settings.imports });

  return {
    eligibleImportNames: registry.names,
    removeAllUnusedImports: settings.removeAllUnusedImports,
    removeUnusedVariables: settings.removeUnusedVariables,
  };
}
