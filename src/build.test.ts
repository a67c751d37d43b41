import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, renameSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { build, runBuild, type BuildDeps } from './build.js';
import { platformInfo } from './compiler/detectPlatform.js';
import type { CompileOutcome, UnitCompiler } from './compiler/compileTypes.js';
import { staticEnvironment } from './env/environment.js';
import { CompileFailureError, ConfigNotFoundError } from './errors.js';
import type { ProcessRunner } from './process/runProcess.js';

function project(files: Record<string, string>) {
  const root = mkdtempSync(join(tmpdir(), 'aot-image-build-'));
  for (const [rel, body] of Object.entries(files)) {
    const p = join(root, rel);
    mkdirSync(dirname(p), { recursive: true });
    writeFileSync(p, body);
  }
  return root;
}

function harness(root: string, opts: { exitCode?: number; failing?: string[] } = {}) {
  const compiled: string[] = [];
  const runs: Array<{ executable: string; args: readonly string[] }> = [];
  const lines: string[] = [];
  const failing = new Set(opts.failing ?? []);

  const compiler: UnitCompiler = {
    compile(unit): CompileOutcome {
      compiled.push(unit);
      if (failing.has(unit)) return { ok: false, unit, cause: new Error('syntax') };
      return { ok: true, unit, outputs: [] };
    },
  };
  const runner: ProcessRunner = {
    async run(executable, args) {
      runs.push({ executable, args });
      return opts.exitCode ?? 0;
    },
  };

  const deps: BuildDeps = {
    env: staticEnvironment({
      cwd: root,
      platform: platformInfo('linux', 'x64'),
      vars: { CLASSPATH: '/deps/a.jar:/opt/aot-image/dist' },
    }),
    locations: {
      install: join(root, 'missing', 'install.json'),
      user: join(root, 'missing', 'user.json'),
      project: join(root, 'deps.json'),
    },
    createUnitCompiler: () => compiler,
    runner,
    out: (l) => lines.push(l),
  };
  return { deps, compiled, runs, lines };
}

describe('runBuild', () => {
  it('compiles explicit, entry, then discovered units and returns the compiler exit code', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: ['src'] }),
      'src/demo/util.ts': 'export {};\n',
    });
    const h = harness(root, { exitCode: 42 });

    const code = await runBuild('demo', ['--static'], { nativeImagePath: '/graal/bin/native-image' }, h.deps);

    expect(code).toBe(42);
    expect(h.compiled).toEqual(['demo', 'demo.util']);
    expect(h.lines).toEqual(['Compiling demo', 'Compiling demo.util']);
    expect(h.runs).toEqual([
      {
        executable: '/graal/bin/native-image',
        args: ['--static', '-cp', `${join(root, 'classes')}:/deps/a.jar`, 'demo', '--no-server'],
      },
    ]);
  });

  it('compiles precompile units before the entry unit and munges the entry point', async () => {
    const root = project({ 'deps.json': JSON.stringify({ paths: [] }) });
    const h = harness(root);

    await runBuild('my-app.main', [], { nativeImagePath: 'ni', precompile: 'a.b,a.c' }, h.deps);

    expect(h.compiled).toEqual(['a.b', 'a.c', 'my-app.main']);
    expect(h.runs[0].args).toContain('my_app.main');
  });

  it('wipes stale files from the scratch directory before compiling', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: [] }),
      'classes/old/stale.js': 'stale',
    });
    const h = harness(root);

    await runBuild('main', [], { nativeImagePath: 'ni' }, { ...h.deps, compilePath: 'classes' });

    expect(existsSync(join(root, 'classes'))).toBe(true);
    expect(existsSync(join(root, 'classes', 'old'))).toBe(false);
  });

  it('stops at the first compile failure without invoking native-image', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: ['src'] }),
      'src/a.ts': '',
      'src/b.ts': '',
      'src/c.ts': '',
    });
    const h = harness(root, { failing: ['b'] });

    await expect(runBuild('main', [], { nativeImagePath: 'ni' }, h.deps)).rejects.toBeInstanceOf(
      CompileFailureError,
    );
    expect(h.compiled).toEqual(['main', 'a', 'b']);
    expect(h.runs).toEqual([]);
  });

  it('fails with ConfigNotFoundError before touching the scratch directory', async () => {
    const root = project({});
    const h = harness(root);

    await expect(runBuild('main', [], { nativeImagePath: 'ni' }, h.deps)).rejects.toBeInstanceOf(
      ConfigNotFoundError,
    );
    expect(existsSync(join(root, 'classes'))).toBe(false);
    expect(h.compiled).toEqual([]);
  });

  it('emits real modules with the default TypeScript unit compiler', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: ['src'] }),
      'src/demo.ts': 'import { y } from "./demo/util.js";\nexport const x: number = y + 1;\n',
      'src/demo/util.ts': 'export const y: number = 1;\n',
    });
    const h = harness(root);
    const { createUnitCompiler: _fake, ...deps } = h.deps;

    const code = await runBuild('demo', [], { nativeImagePath: 'ni', echo: true }, deps);

    expect(code).toBe(0);
    expect(existsSync(join(root, 'classes', 'demo.js'))).toBe(true);
    expect(existsSync(join(root, 'classes', 'demo', 'util.js'))).toBe(true);
    expect(h.lines).toEqual([
      'Compiling demo',
      'Compiling demo.util',
      `ni -cp ${join(root, 'classes')}:/deps/a.jar demo --no-server`,
    ]);
  });
});

describe('runBuild with the project root as a source root', () => {
  function realCompilerHarness(root: string) {
    const { createUnitCompiler: _fake, ...deps } = harness(root).deps;
    const lines: string[] = [];
    return { deps: { ...deps, out: (l: string) => lines.push(l) }, lines };
  }

  it('does not pick up last run\'s output as units when rebuilding', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: ['.'] }),
      'script.ts': 'export const answer: number = 42;\n',
    });

    const first = realCompilerHarness(root);
    await runBuild('script', [], { nativeImagePath: 'ni' }, first.deps);
    expect(first.lines).toEqual(['Compiling script']);
    expect(existsSync(join(root, 'classes', 'script.js'))).toBe(true);

    const second = realCompilerHarness(root);
    const code = await runBuild('script', [], { nativeImagePath: 'ni' }, second.deps);
    expect(code).toBe(0);
    expect(second.lines).toEqual(['Compiling script']);
    expect(existsSync(join(root, 'classes', 'classes'))).toBe(false);
  });

  it('builds a renamed entry without compiling stale scratch files', async () => {
    const root = project({
      'deps.json': JSON.stringify({ paths: ['.'] }),
      'script.ts': 'export {};\n',
    });
    await runBuild('script', [], { nativeImagePath: 'ni' }, realCompilerHarness(root).deps);

    renameSync(join(root, 'script.ts'), join(root, 'main.ts'));
    const next = realCompilerHarness(root);
    await runBuild('main', [], { nativeImagePath: 'ni' }, next.deps);

    expect(next.lines).toEqual(['Compiling main']);
    expect(existsSync(join(root, 'classes', 'main.js'))).toBe(true);
    expect(existsSync(join(root, 'classes', 'script.js'))).toBe(false);
  });
});

class ExitCalled extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

describe('build', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits the process with the compiler exit code', async () => {
    const root = project({ 'deps.json': JSON.stringify({ paths: [] }) });
    const h = harness(root, { exitCode: 5 });
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });

    await expect(build('main', [], { nativeImagePath: 'ni' }, h.deps)).rejects.toThrow('process.exit(5)');
  });
});
