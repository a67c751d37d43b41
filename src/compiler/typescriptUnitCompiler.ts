import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, relative } from 'node:path';
import ts from 'typescript';

import { InvalidDescriptorError } from '../errors.js';
import { logDebug } from '../dx/logger.js';
import { locateUnitSource } from '../units/discoverUnits.js';
import type { UnitSource } from '../units/findUnitsInDir.js';
import type { UnitId } from '../units/unitId.js';
import type { CompileOutcome, UnitCompiler } from './compileTypes.js';

export type TypeScriptUnitCompilerOptions = {
  /** Scratch directory emitted modules are written to. */
  outDir: string;
  /** Absolute source roots, searched for units not in `sources`. */
  roots: string[];
  sources?: ReadonlyMap<UnitId, UnitSource>;
  /** Raw `compilerOptions` from deps.json. */
  compilerOptions?: Record<string, unknown>;
  /** Base directory for relative paths inside `compilerOptions`. */
  projectRoot?: string;
};

// compilerOptions may come from any deps.json layer; only the merge is known here.
const MERGED_DESCRIPTOR = 'merged deps.json';

const DEFAULT_OPTIONS: ts.CompilerOptions = {
  module: ts.ModuleKind.ESNext,
  target: ts.ScriptTarget.ES2022,
};

export function resolveCompilerOptions(
  raw: Record<string, unknown> | undefined,
  projectRoot: string,
): ts.CompilerOptions {
  if (!raw) return { ...DEFAULT_OPTIONS };
  const { options, errors } = ts.convertCompilerOptionsFromJson(raw, projectRoot);
  if (errors.length) {
    throw new InvalidDescriptorError(
      MERGED_DESCRIPTOR,
      `compilerOptions: ${errors.map((e) => ts.flattenDiagnosticMessageText(e.messageText, ' ')).join('; ')}`,
    );
  }
  return { ...DEFAULT_OPTIONS, ...options };
}

export function formatDiagnostics(diags: readonly ts.Diagnostic[]): string {
  const lines: string[] = [];
  for (const d of diags) {
    const msg = ts.flattenDiagnosticMessageText(d.messageText, '\n');
    if (d.file && d.start != null) {
      const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
      lines.push(`${d.file.fileName}:${line + 1}:${character + 1} - error TS${d.code}: ${msg}`);
    } else {
      lines.push(`error TS${d.code}: ${msg}`);
    }
  }
  return lines.join('\n');
}

function outputPathFor(source: UnitSource, outDir: string): string {
  const rel = relative(source.root, source.file);
  const jsRel = rel.replace(/\.mts$/, '.mjs').replace(/\.(tsx?|js)$/, '.js');
  return join(outDir, jsRel);
}

/**
 * Compiles units by emitting each module on its own with the TypeScript
 * compiler. Only syntactic errors fail a unit; types are not checked.
 */
export function createTypeScriptUnitCompiler(opts: TypeScriptUnitCompilerOptions): UnitCompiler {
  const compilerOptions = resolveCompilerOptions(opts.compilerOptions, opts.projectRoot ?? process.cwd());

  return {
    compile(unit: UnitId): CompileOutcome {
      const source = opts.sources?.get(unit) ?? locateUnitSource(unit, opts.roots);
      if (!source) {
        return {
          ok: false,
          unit,
          cause: new Error(`no source file for ${unit} under ${opts.roots.join(', ') || '(no source roots)'}`),
        };
      }

      try {
        const text = readFileSync(source.file, 'utf8');
        const res = ts.transpileModule(text, {
          fileName: source.file,
          compilerOptions,
          reportDiagnostics: true,
        });

        const errors = (res.diagnostics ?? []).filter(
          (d) => d.category === ts.DiagnosticCategory.Error,
        );
        if (errors.length) {
          return { ok: false, unit, cause: new Error(formatDiagnostics(errors)) };
        }

        const outPath = outputPathFor(source, opts.outDir);
        mkdirSync(dirname(outPath), { recursive: true });
        writeFileSync(outPath, res.outputText);
        const outputs = [outPath];
        if (res.sourceMapText) {
          writeFileSync(`${outPath}.map`, res.sourceMapText);
          outputs.push(`${outPath}.map`);
        }

        logDebug('compiled', { unit, file: source.file, out: outPath });
        return { ok: true, unit, outputs };
      } catch (err) {
        return { ok: false, unit, cause: err };
      }
    },
  };
}
