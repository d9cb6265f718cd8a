import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';

export interface CollectOptions {
  /** Expand directories into the Python files beneath them */
  recursive?: boolean;
  /** Directory names or glob patterns to skip while expanding */
  exclude?: string[];
}

function toIgnorePatterns(exclude: string[]): string[] {
  return exclude.map((p) => {
    if (p.includes('*')) return `**/${p}`;
    return `**/${p}/**`;
  });
}

function isDirectory(name: string): boolean {
  try {
    return fs.statSync(name).isDirectory();
  } catch {
    // Missing paths are reported when the file is read
    return false;
  }
}

/**
 * Resolve command-line names into the list of files to fix.
 *
 * Names are de-duplicated. Hidden files and directories are skipped when
 * expanding a directory; names given explicitly are always kept.
 */
export function collectPythonFiles(names: string[], options: CollectOptions = {}): string[] {
  const files: string[] = [];
  const seen = new Set<string>();

  const add = (file: string): void => {
    if (seen.has(file)) return;
    seen.add(file);
    files.push(file);
  };

  for (const name of names) {
    if (!options.recursive || !isDirectory(name)) {
      add(name);
      continue;
    }

    const found = globSync('**/*.py', {
      cwd: name,
      dot: false,
      nodir: true,
      ignore: toIgnorePatterns(options.exclude ?? []),
    });

    for (const file of found.sort()) {
      add(path.join(name, file));
    }
  }

  return files;
}
