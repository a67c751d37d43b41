import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { InvalidDescriptorError } from '../errors.js';
import { createTypeScriptUnitCompiler, resolveCompilerOptions } from './typescriptUnitCompiler.js';

function workspace(files: Record<string, string>) {
  const root = mkdtempSync(join(tmpdir(), 'aot-image-tsc-'));
  for (const [rel, body] of Object.entries(files)) {
    const p = join(root, rel);
    mkdirSync(dirname(p), { recursive: true });
    writeFileSync(p, body);
  }
  return { root, src: join(root, 'src'), outDir: join(root, 'classes') };
}

describe('TypeScript unit compiler', () => {
  it('emits a unit to the scratch dir, mirroring its path', () => {
    const ws = workspace({ 'src/app/core_util.ts': 'export const x: number = 1;\n' });
    const compiler = createTypeScriptUnitCompiler({ outDir: ws.outDir, roots: [ws.src], projectRoot: ws.root });

    const res = compiler.compile('app.core-util');

    expect(res.ok).toBe(true);
    const out = join(ws.outDir, 'app', 'core_util.js');
    expect(res.ok && res.outputs).toEqual([out]);
    expect(readFileSync(out, 'utf8')).toContain('export const x = 1;');
  });

  it('writes source maps when the descriptor asks for them', () => {
    const ws = workspace({ 'src/main.ts': 'export default 42;\n' });
    const compiler = createTypeScriptUnitCompiler({
      outDir: ws.outDir,
      roots: [ws.src],
      compilerOptions: { sourceMap: true },
      projectRoot: ws.root,
    });

    const res = compiler.compile('main');

    expect(res.ok).toBe(true);
    expect(existsSync(join(ws.outDir, 'main.js.map'))).toBe(true);
  });

  it('fails a unit with syntax errors without writing output', () => {
    const ws = workspace({ 'src/bad.ts': 'const = ;\n' });
    const compiler = createTypeScriptUnitCompiler({ outDir: ws.outDir, roots: [ws.src], projectRoot: ws.root });

    const res = compiler.compile('bad');

    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.unit).toBe('bad');
      expect(String(res.cause)).toContain(`${join(ws.src, 'bad.ts')}:1:`);
      expect(String(res.cause)).toContain('error TS');
    }
    expect(existsSync(join(ws.outDir, 'bad.js'))).toBe(false);
  });

  it('fails a unit that has no source file', () => {
    const ws = workspace({});
    const compiler = createTypeScriptUnitCompiler({ outDir: ws.outDir, roots: [ws.src], projectRoot: ws.root });

    const res = compiler.compile('ghost.unit');

    expect(res.ok).toBe(false);
    if (!res.ok) expect(String(res.cause)).toBe(`Error: no source file for ghost.unit under ${ws.src}`);
  });
});

describe('resolveCompilerOptions', () => {
  it('rejects options TypeScript does not accept', () => {
    expect(() => resolveCompilerOptions({ target: 'es1999' }, tmpdir())).toThrow(InvalidDescriptorError);
  });

  it('names the merged descriptor, not a single deps.json file', () => {
    let caught: unknown;
    try {
      resolveCompilerOptions({ target: 'es1999' }, tmpdir());
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidDescriptorError);
    if (!(caught instanceof InvalidDescriptorError)) return;
    expect(caught.file).toBe('merged deps.json');
    expect(caught.message.startsWith('Invalid configuration in merged deps.json: compilerOptions: ')).toBe(true);
  });

  it('keeps defaults when nothing is configured', () => {
    const opts = resolveCompilerOptions(undefined, tmpdir());
    expect(opts.module).toBeDefined();
    expect(opts.target).toBeDefined();
  });
});
