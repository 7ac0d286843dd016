import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { outlineSource, runOutline } from '../outline/pipeline.js';
import { TreeSitterManager } from '../parser/tree-sitter-manager.js';
import { DEFAULT_IGNORE_PATTERNS } from '../core/config.js';
import { InvalidDirectoryError } from '../core/errors.js';
import type { ExtractOptions, FileOutline, FileResult } from '../outline/types.js';

const manager = new TreeSitterManager();
let root: string;

function write(relativePath: string, content: string | Buffer): void {
  const target = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

beforeAll(async () => {
  await manager.initialize();
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'py-outline-pipeline-'));
  write('good.py', 'def ok(a):\n    pass\n');
  write('bad.py', 'def broken(:\n    pass\n');
  write('pkg/mod.py', 'class M:\n    def m(self):\n        pass\n');
  write('tests/unit/test_a.py', 'def test_a():\n    pass\n');
  write('venv/lib/site.py', 'def hidden():\n    pass\n');
  write('notes.txt', 'def not_python():\n');
});

function outlineOf(result: FileResult | undefined): FileOutline {
  if (!result || !result.ok) throw new Error(`expected ${result?.path} to parse`);
  return result.outline;
}

afterAll(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('runOutline', () => {
  it('outlines every kept file and isolates the one that fails to parse', async () => {
    const report = await runOutline(
      {
        root,
        verbosity: 1,
        docstrings: false,
        ignorePatterns: [...DEFAULT_IGNORE_PATTERNS, 'tests/'],
      },
      manager,
    );

    expect(report.root).toBe(path.resolve(root));
    expect(report.files.map((f) => [f.path, f.ok])).toEqual([
      ['bad.py', false],
      ['good.py', true],
      ['pkg/mod.py', true],
    ]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(
      /^Error parsing bad\.py: invalid syntax at line \d+, column \d+$/,
    );

    expect(outlineOf(report.files[1]).functions).toEqual([{ signature: 'ok(a)' }]);
    expect([...outlineOf(report.files[2]).classes.keys()]).toEqual(['M']);
  });

  it('reports undecodable files as read errors', async () => {
    const latinRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'py-outline-latin-'));
    try {
      fs.writeFileSync(path.join(latinRoot, 'latin.py'), Buffer.from([0x23, 0x20, 0xff, 0x0a]));
      fs.writeFileSync(path.join(latinRoot, 'fine.py'), 'def fine():\n    pass\n');

      const report = await runOutline(
        { root: latinRoot, verbosity: 0, docstrings: false, ignorePatterns: [] },
        manager,
      );
      expect(report.files.map((f) => f.ok)).toEqual([true, false]);
      expect(report.errors).toHaveLength(1);
      expect(report.errors[0]?.startsWith('Error reading latin.py: ')).toBe(true);
    } finally {
      fs.rmSync(latinRoot, { recursive: true, force: true });
    }
  });

  it('rejects a missing directory', async () => {
    await expect(
      runOutline(
        { root: path.join(root, 'missing'), verbosity: 0, docstrings: false, ignorePatterns: [] },
        manager,
      ),
    ).rejects.toBeInstanceOf(InvalidDirectoryError);
  });

  it('rejects a file given as the root', async () => {
    await expect(
      runOutline(
        { root: path.join(root, 'good.py'), verbosity: 0, docstrings: false, ignorePatterns: [] },
        manager,
      ),
    ).rejects.toThrow(/not a directory/);
  });
});

describe('outlineSource', () => {
  it('returns the outline of valid source', () => {
    const result = outlineSource('def f(x, y=1) -> int:\n    return x\n', 'f.py', manager, {
      verbosity: 2,
      docstrings: false,
    });
    expect(result).toEqual({
      ok: true,
      path: 'f.py',
      outline: { classes: new Map(), functions: [{ signature: 'f(x, y=1) -> int' }] },
    });
  });

  it('turns a syntax error into a single message naming the path', () => {
    const result = outlineSource('class Broken(\n', 'pkg/broken.py', manager, {
      verbosity: 0,
      docstrings: false,
    });
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toMatch(/^Error parsing pkg\/broken\.py: invalid syntax/);
  });

  it('rejects Python 2 print and exec statements at their position', () => {
    const options: ExtractOptions = { verbosity: 0, docstrings: false };
    expect(outlineSource('print "x"\n', 'legacy.py', manager, options)).toEqual({
      ok: false,
      path: 'legacy.py',
      error: 'Error parsing legacy.py: invalid syntax at line 1, column 1',
    });
    expect(
      outlineSource('def run(code):\n    exec code\n', 'legacy_exec.py', manager, options),
    ).toEqual({
      ok: false,
      path: 'legacy_exec.py',
      error: 'Error parsing legacy_exec.py: invalid syntax at line 2, column 5',
    });
  });

  it('accepts print called as a function', () => {
    const result = outlineSource('print("x")\ndef f():\n    pass\n', 'modern.py', manager, {
      verbosity: 0,
      docstrings: false,
    });
    expect(result.ok).toBe(true);
  });

  it('reports a grammar that was never loaded', () => {
    const result = outlineSource('x = 1\n', 'x.py', new TreeSitterManager(), {
      verbosity: 0,
      docstrings: false,
    });
    expect(result).toEqual({
      ok: false,
      path: 'x.py',
      error: 'Error parsing x.py: Grammar for python is not loaded. Call initialize() first.',
    });
  });
});
