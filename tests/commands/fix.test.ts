import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

// Fake pyflakes: answers from `reports`, keyed by the exact text on stdin
let reports: Record<string, string> = {};
let analyzerMissing = false;

const mockSpawnSync = vi.fn((_command: string, args: string[], options: { input?: string }) => {
  if (analyzerMissing) {
    return { error: new Error('spawn python3 ENOENT'), status: null, stdout: '', stderr: '' };
  }
  if (args.includes('--version')) {
    return { status: 0, stdout: '3.2.0\n', stderr: '' };
  }
  return { status: 1, stdout: reports[options.input ?? ''] ?? '', stderr: '' };
});
vi.mock('node:child_process', () => ({ spawnSync: mockSpawnSync }));

// Mock ora
const mockOra = {
  start: vi.fn().mockReturnThis(),
  succeed: vi.fn().mockReturnThis(),
  warn: vi.fn().mockReturnThis(),
};
vi.mock('ora', () => ({ default: vi.fn(() => mockOra) }));

// Mock inquirer
const mockPrompt = vi.fn();
vi.mock('inquirer', () => ({
  default: {
    prompt: mockPrompt,
  },
}));

// Mock Conf
vi.mock('conf', () => ({
  default: class MockConf {
    get() {
      return undefined;
    }
    set() {}
    delete() {}
  },
}));

const originalConsoleLog = console.log;
const originalConsoleError = console.error;
const originalCwd = process.cwd();

describe('fixCommand', () => {
  let tempDir: string;
  let consoleLogs: string[];
  let consoleErrors: string[];
  let stdout: string[];
  let exitSpy: MockInstance<typeof process.exit>;
  let writeSpy: MockInstance<typeof process.stdout.write>;

  const readFile = (name: string) => fs.readFileSync(path.join(tempDir, name), 'utf-8');

  beforeEach(() => {
    vi.clearAllMocks();
    reports = {};
    analyzerMissing = false;
    consoleLogs = [];
    consoleErrors = [];
    stdout = [];
    delete process.env.UNFLAKE_ANALYZER;

    console.log = vi.fn((...args) => consoleLogs.push(args.join(' ')));
    console.error = vi.fn((...args) => consoleErrors.push(args.join(' ')));
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });

    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'unflake-test-'));
    process.chdir(tempDir);
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    exitSpy.mockRestore();
    writeSpy.mockRestore();
    process.chdir(originalCwd);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('prints a diff without touching the file', async () => {
    const source = 'import os\nimport sys\nprint(sys.argv)\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    reports[source] = "<stdin>:1:1: 'os' imported but unused\n";

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['mod.py'], {});

    const output = stdout.join('');
    expect(output).toContain('+++ fixed/mod.py');
    expect(output).toContain('-import os');
    expect(output).toContain(' import sys\n');
    expect(readFile('mod.py')).toBe(source);
  });

  it('rewrites files in place', async () => {
    const source = 'import os\nimport sys\nprint(sys.argv)\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    reports[source] = "<stdin>:1:1: 'os' imported but unused\n";

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['mod.py'], { inPlace: true, yes: true });

    expect(readFile('mod.py')).toBe('import sys\nprint(sys.argv)\n');
    expect(mockOra.succeed).toHaveBeenCalledWith('Fixed 1 of 1 file(s)');
    expect(consoleLogs.join('\n')).toContain('- mod.py');
    expect(stdout).toEqual([]);
  });

  it('removes unused variables when asked', async () => {
    const source = 'def f():\n    x = compute()\n    return 1\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    reports[source] = "<stdin>:2:5: local variable 'x' is assigned to but never used\n";

    const { fixCommand } = await import('../../src/commands/fix.js');

    await fixCommand(['mod.py'], { inPlace: true, yes: true });
    expect(readFile('mod.py')).toBe(source);

    await fixCommand(['mod.py'], { inPlace: true, yes: true, removeUnusedVariables: true });
    expect(readFile('mod.py')).toBe('def f():\n    compute()\n    return 1\n');
  });

  it('reads switches from the project config', async () => {
    const source = 'x = 1\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    fs.writeFileSync(path.join(tempDir, '.unflakerc'), JSON.stringify({ removeUnusedVariables: true }));
    reports[source] = "<stdin>:1:1: local variable 'x' is assigned to but never used\n";

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['mod.py'], { inPlace: true, yes: true });

    expect(readFile('mod.py')).toBe('pass\n');
  });

  it('walks directories and honors --imports', async () => {
    fs.mkdirSync(path.join(tempDir, 'pkg'));
    fs.writeFileSync(path.join(tempDir, 'pkg', 'a.py'), 'import requests\n');
    reports['import requests\n'] = "<stdin>:1:1: 'requests' imported but unused\n";

    const { fixCommand } = await import('../../src/commands/fix.js');

    await fixCommand(['pkg'], { recursive: true, inPlace: true, yes: true });
    expect(readFile('pkg/a.py')).toBe('import requests\n');

    await fixCommand(['pkg'], { recursive: true, inPlace: true, yes: true, imports: 'requests' });
    expect(readFile('pkg/a.py')).toBe('pass\n');
  });

  it('prints a JSON summary', async () => {
    const source = 'import os\nimport sys\nprint(sys.argv)\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    reports[source] = "<stdin>:1:1: 'os' imported but unused\n";

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['mod.py'], { json: true });

    expect(consoleLogs).toHaveLength(1);
    expect(JSON.parse(consoleLogs[0])).toEqual({
      files: [{ file: 'mod.py', changed: true, iterations: 2, converged: true, analyzerErrors: [] }],
      errors: [],
    });
    expect(stdout).toEqual([]);
  });

  it('reports passes with --verbose', async () => {
    fs.writeFileSync(path.join(tempDir, 'clean.py'), 'print(1)\n');

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['clean.py'], { verbose: true });

    expect(consoleLogs.join('\n')).toContain('clean.py: 1 pass(es)');
  });

  it('rejects --imports together with --remove-all-unused-imports', async () => {
    const { fixCommand } = await import('../../src/commands/fix.js');

    await expect(fixCommand(['mod.py'], { imports: 'django', removeAllUnusedImports: true })).rejects.toThrow(
      'process.exit(1)'
    );
    expect(consoleErrors.join('\n')).toContain('--remove-all-unused-imports and --imports is redundant');
  });

  it('rejects --remove-all-unused-imports when the project config lists imports', async () => {
    fs.writeFileSync(path.join(tempDir, '.unflakerc'), JSON.stringify({ imports: ['django'] }));

    const { fixCommand } = await import('../../src/commands/fix.js');

    await expect(fixCommand(['mod.py'], { removeAllUnusedImports: true })).rejects.toThrow('process.exit(1)');
    expect(consoleErrors.join('\n')).toContain('--remove-all-unused-imports and --imports is redundant');
    expect(mockSpawnSync).not.toHaveBeenCalled();
  });

  it('cleans a file that starts with a byte-order mark and keeps the mark', async () => {
    const bom = Buffer.from([0xef, 0xbb, 0xbf]);
    const source = 'import os\nprint(1)\n';
    fs.writeFileSync(path.join(tempDir, 'bom.py'), Buffer.concat([bom, Buffer.from(source)]));
    reports[source] = "<stdin>:1:1: 'os' imported but unused\n";

    const { fixCommand } = await import('../../src/commands/fix.js');
    await fixCommand(['bom.py'], { inPlace: true, yes: true });

    expect(fs.readFileSync(path.join(tempDir, 'bom.py'))).toEqual(Buffer.concat([bom, Buffer.from('print(1)\n')]));
    expect(mockOra.succeed).toHaveBeenCalledWith('Fixed 1 of 1 file(s)');
  });

  it('exits when the analyzer cannot be started', async () => {
    analyzerMissing = true;

    const { fixCommand } = await import('../../src/commands/fix.js');

    await expect(fixCommand(['mod.py'], {})).rejects.toThrow('process.exit(1)');
    expect(consoleErrors.join('\n')).toContain('Analyzer "python3" could not be started');
  });

  it('reports unreadable files and exits with an error', async () => {
    fs.writeFileSync(path.join(tempDir, 'ok.py'), 'print(1)\n');

    const { fixCommand } = await import('../../src/commands/fix.js');

    await expect(fixCommand(['ok.py', 'missing.py'], { inPlace: true, yes: true })).rejects.toThrow(
      'process.exit(1)'
    );
    expect(mockOra.warn).toHaveBeenCalledWith('Fixed 0 file(s), 1 failed');
    expect(consoleErrors.join('\n')).toContain('missing.py: ENOENT');
  });

  it('asks before rewriting files from a terminal', async () => {
    const source = 'import os\nprint(1)\n';
    fs.writeFileSync(path.join(tempDir, 'mod.py'), source);
    reports[source] = "<stdin>:1:1: 'os' imported but unused\n";
    mockPrompt.mockResolvedValueOnce({ confirm: false });

    const descriptor = Object.getOwnPropertyDescriptor(process.stdin, 'isTTY');
    Object.defineProperty(process.stdin, 'isTTY', { value: true, configurable: true });

    try {
      const { fixCommand } = await import('../../src/commands/fix.js');
      await fixCommand(['mod.py'], { inPlace: true });
    } finally {
      if (descriptor) {
        Object.defineProperty(process.stdin, 'isTTY', descriptor);
      } else {
        Reflect.deleteProperty(process.stdin, 'isTTY');
      }
    }

    expect(mockPrompt).toHaveBeenCalledTimes(1);
    expect(consoleLogs.join('\n')).toContain('Cancelled');
    expect(readFile('mod.py')).toBe(source);
  });
});
