/**
 * Safe-import registry
 *
 * The set of module names whose unused imports may be removed without
 * asking: the standard library, minus modules that do something when
 * imported, plus whatever the caller allows on top.
 *
 * Built once and passed by reference into every rewrite call.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/** Standard modules that run code on import */
export const IMPORTS_WITH_SIDE_EFFECTS: ReadonlySet<string> = new Set(['antigravity', 'rlcompleter', 'this']);

/** Modules that may be compiled into the interpreter and so never show up on disk */
export const BINARY_IMPORTS: ReadonlySet<string> = new Set([
  'datetime', 'grp', 'io', 'json', 'math', 'multiprocessing', 'parser',
  'pwd', 'string', 'operator', 'os', 'sys', 'time',
]);

export const DEFAULT_STDLIB_LIST = fileURLToPath(new URL('../../data/stdlib-modules.json', import.meta.url));

const ModuleListSchema = z.array(z.string());

const MODULE_FILE_EXTENSIONS = new Set(['so', 'py', 'pyc']);

export class SafeImportRegistry {
  readonly names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    this.names = new Set(names);
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }
}

export interface SafeImportRegistryOptions {
  /** Extra module names to treat as safe */
  additionalImports?: string[];
  /** Standard-library entries; read from the bundled list when omitted */
  standardModules?: Iterable<string>;
}

/**
 * Read the bundled list of standard-library entries
 */
export function loadStandardModuleNames(filePath: string = DEFAULT_STDLIB_LIST): string[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  return ModuleListSchema.parse(JSON.parse(content));
}

/**
 * Reduce standard-library entries (module names or file names as found
 * in the library directory) to importable top-level package names.
 */
export function standardPackageNames(entries: Iterable<string>): string[] {
  const names: string[] = [];

  for (const entry of entries) {
    if (entry.startsWith('_') || entry.includes('-')) continue;

    if (entry.includes('.')) {
      const extension = entry.split('.').pop() ?? '';
      if (!MODULE_FILE_EXTENSIONS.has(extension)) continue;
    }

    names.push(entry.split('.')[0]);
  }

  return names;
}

export function createSafeImportRegistry(options: SafeImportRegistryOptions = {}): SafeImportRegistry {
  const standard = options.standardModules ?? loadStandardModuleNames();
  const names = new Set(standardPackageNames(standard));

  for (const name of IMPORTS_WITH_SIDE_EFFECTS) {
    names.delete(name);
  }
  for (const name of BINARY_IMPORTS) {
    names.add(name);
  }
  for (const name of options.additionalImports ?? []) {
    const trimmed = name.trim();
    if (trimmed) names.add(trimmed);
  }

  return new SafeImportRegistry(names);
}
