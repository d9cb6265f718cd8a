import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  loadProjectConfig,
  mergeWithDefaults,
  parseImportList,
  readConfigFile,
  ConfigLoadError,
  ConfigValidationError,
} from '../../src/core/config.js';

describe('Config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'unflake-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('loadProjectConfig', () => {
    it('returns empty config when no config file exists', () => {
      expect(loadProjectConfig(tempDir)).toEqual({});
    });

    it('loads .unflakerc file', () => {
      const configContent = {
        imports: ['django'],
        removeUnusedVariables: true,
      };
      fs.writeFileSync(path.join(tempDir, '.unflakerc'), JSON.stringify(configContent));

      expect(loadProjectConfig(tempDir)).toEqual(configContent);
    });

    it('loads .unflakerc.json file', () => {
      const configContent = { exclude: ['build'], maxIterations: 10 };
      fs.writeFileSync(path.join(tempDir, '.unflakerc.json'), JSON.stringify(configContent));

      expect(loadProjectConfig(tempDir)).toEqual(configContent);
    });

    it('loads unflake.config.json file', () => {
      const configContent = { analyzer: { command: 'pyflakes', args: [] } };
      fs.writeFileSync(path.join(tempDir, 'unflake.config.json'), JSON.stringify(configContent));

      expect(loadProjectConfig(tempDir)).toEqual(configContent);
    });

    it('prefers .unflakerc over other config files', () => {
      fs.writeFileSync(path.join(tempDir, '.unflakerc'), JSON.stringify({ imports: ['first'] }));
      fs.writeFileSync(path.join(tempDir, 'unflake.config.json'), JSON.stringify({ imports: ['second'] }));

      expect(loadProjectConfig(tempDir)).toEqual({ imports: ['first'] });
    });

    it('warns and returns empty config for invalid JSON', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      fs.writeFileSync(path.join(tempDir, '.unflakerc'), 'not valid json');

      expect(loadProjectConfig(tempDir)).toEqual({});
      expect(warn).toHaveBeenCalledWith('Warning: Failed to parse .unflakerc');
    });

    it('warns and returns empty config for a schema violation', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      fs.writeFileSync(path.join(tempDir, '.unflakerc'), JSON.stringify({ imports: 'django' }));

      expect(loadProjectConfig(tempDir)).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0][0])).toContain('Invalid .unflakerc: imports:');
    });
  });

  describe('readConfigFile', () => {
    it('throws ConfigLoadError for unparseable files', () => {
      const configPath = path.join(tempDir, '.unflakerc');
      fs.writeFileSync(configPath, '{');

      expect(() => readConfigFile(configPath)).toThrow(ConfigLoadError);
    });

    it('reports every schema issue with its path', () => {
      const configPath = path.join(tempDir, '.unflakerc');
      fs.writeFileSync(configPath, JSON.stringify({ maxIterations: 0, analyzer: { command: '' } }));

      try {
        readConfigFile(configPath);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.issues.map((issue) => issue.path)).toEqual(['maxIterations', 'analyzer.command']);
          expect(error.filePath).toBe(configPath);
        }
      }
    });

    it('rejects unknown keys', () => {
      const configPath = path.join(tempDir, '.unflakerc');
      fs.writeFileSync(configPath, JSON.stringify({ ignore: ['tests'] }));

      expect(() => readConfigFile(configPath)).toThrow(ConfigValidationError);
    });
  });

  describe('mergeWithDefaults', () => {
    it('applies defaults for missing values', () => {
      expect(mergeWithDefaults({})).toEqual({
        imports: [],
        removeAllUnusedImports: false,
        removeUnusedVariables: false,
        exclude: [],
        maxIterations: 100,
        analyzer: { command: 'python3', args: ['-m', 'pyflakes'] },
      });
    });

    it('combines imports from config and command line', () => {
      const settings = mergeWithDefaults({ imports: ['django'] }, { imports: ['requests'] });
      expect(settings.imports).toEqual(['django', 'requests']);
    });

    it('turns on removals from either source', () => {
      const settings = mergeWithDefaults({ removeUnusedVariables: true }, { removeAllUnusedImports: true });

      expect(settings.removeUnusedVariables).toBe(true);
      expect(settings.removeAllUnusedImports).toBe(true);
    });

    it('uses the global analyzer when the project sets none', () => {
      const settings = mergeWithDefaults({}, {}, { command: 'pyflakes', args: [] });
      expect(settings.analyzer).toEqual({ command: 'pyflakes', args: [] });
    });

    it('prefers the project analyzer over the global one', () => {
      const settings = mergeWithDefaults(
        { analyzer: { command: 'python3.12' } },
        {},
        { command: 'pyflakes', args: ['--quiet'] }
      );
      expect(settings.analyzer).toEqual({ command: 'python3.12', args: ['--quiet'] });
    });
  });

  describe('parseImportList', () => {
    it('splits and trims a comma-separated list', () => {
      expect(parseImportList('django, requests,,numpy ')).toEqual(['django', 'requests', 'numpy']);
    });

    it('returns an empty list when unset', () => {
      expect(parseImportList(undefined)).toEqual([]);
      expect(parseImportList('')).toEqual([]);
    });
  });
});
