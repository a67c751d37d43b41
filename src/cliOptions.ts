import { Command, CommanderError } from 'commander';

import { runBuild, type BuildDeps } from './build.js';
import { AotImageError, isAotImageError } from './errors.js';
import {
  DEFAULT_HOME_ENV,
  DEFAULT_NATIVE_IMAGE_BINARY,
  loadOptionalConfig,
  resolveRuntimeConfig,
} from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { isTraceEnabled } from './dx/trace.js';
import { processEnvironment } from './env/environment.js';
import { locateNativeImage } from './nativeImage/locateNativeImage.js';

export const VERSION = '0.1.0';

export type CliOptions = {
  nativeImagePath?: string;
  echo?: boolean;
  precompile?: string;
};

export type ParsedCommandLine = {
  options: CliOptions;
  /** Positional arguments before `--`; the first is the entry unit. */
  arguments: string[];
  /** Everything after the first `--`, verbatim. */
  compilerArgs: string[];
};

type Writer = (text: string) => void;

/** Our arguments vs. native-image's, split at the first literal `--`. */
export function splitCompilerArgs(argv: readonly string[]): { ours: string[]; compilerArgs: string[] } {
  const at = argv.indexOf('--');
  if (at === -1) return { ours: [...argv], compilerArgs: [] };
  return { ours: argv.slice(0, at), compilerArgs: argv.slice(at + 1) };
}

export function createProgram(
  defaultNativeImagePath: string | null,
  homeEnv: string = DEFAULT_HOME_ENV,
  binary: string = DEFAULT_NATIVE_IMAGE_BINARY,
): Command {
  return new Command()
    .name('aot-image')
    .usage('[MAIN_UNIT] [OPTS] -- [COMPILER_ARGS]')
    .description('Compile a TypeScript project and build a native image of its entry unit.')
    .version(VERSION, '-V, --version', 'Print version')
    .argument('[main-unit]', 'Entry unit, e.g. "app.main" for src/app/main.ts')
    .option(
      '-n, --native-image-path <path>',
      `Use a specific ${binary} binary.`,
      defaultNativeImagePath ?? undefined,
    )
    .option('-e, --echo', `Print out the ${binary} invocation.`)
    .option(
      '-p, --precompile <units>',
      'Units to compile before the main unit, comma separated.',
    )
    .helpOption('-h, --help', 'Output this help information.')
    .addHelpText(
      'after',
      `
If no --native-image-path is provided then ${binary} is searched for in $${homeEnv}/bin, $${homeEnv}, and $PATH.

Any arguments after -- are passed on verbatim to ${binary}.`,
    );
}

export function parseCommandLine(argv: readonly string[], program: Command): ParsedCommandLine {
  const { ours, compilerArgs } = splitCompilerArgs(argv);
  program.parse(ours, { from: 'user' });
  return {
    options: program.opts<CliOptions>(),
    arguments: [...program.args],
    compilerArgs,
  };
}

export type PreflightResult =
  | { ok: true; nativeImagePath: string; entryUnit: string }
  | { ok: false; error: AotImageError };

/**
 * Checks that must pass before anything touches the disk.
 */
export function preflight(
  parsed: ParsedCommandLine,
  homeEnv: string = DEFAULT_HOME_ENV,
  binary: string = DEFAULT_NATIVE_IMAGE_BINARY,
): PreflightResult {
  const nativeImagePath = parsed.options.nativeImagePath;
  if (!nativeImagePath) {
    return {
      ok: false,
      error: new AotImageError(
        'BINARY_NOT_FOUND',
        `Could not find GraalVM's ${binary}! Please make sure that the environment variable $${homeEnv} is set. ` +
          `The ${binary} tool must also be installed ($${homeEnv}/bin/gu install ${binary}).\n` +
          `If you do not wish to set the ${homeEnv} environment variable, you can use the --native-image-path ` +
          'flag to set the binary explicitly. Try --help for options.',
      ),
    };
  }
  const [entryUnit] = parsed.arguments;
  if (!entryUnit) {
    return {
      ok: false,
      error: new AotImageError(
        'MISSING_ENTRY_UNIT',
        'Main unit required e.g. "app.main" if the entry file is ./src/app/main.ts',
      ),
    };
  }
  return { ok: true, nativeImagePath, entryUnit };
}

export type RunCliDeps = Omit<BuildDeps, 'out' | 'compilePath' | 'homeEnv'> & {
  stdout?: Writer;
  stderr?: Writer;
};

/**
 * Parses `argv` (without node and script), runs one build and resolves with
 * the exit code the process should end with.
 */
export async function runCli(argv: readonly string[], deps: RunCliDeps = {}): Promise<number> {
  const { stdout = (s) => process.stdout.write(s), stderr = (s) => process.stderr.write(s), ...buildDeps } =
    deps;
  const env = buildDeps.env ?? processEnvironment();

  try {
    const config = resolveRuntimeConfig(await loadOptionalConfig(env.cwd()), env.cwd());
    if (config.debug) setDebugEnabled(true);

    const program = createProgram(
      locateNativeImage(env, { binary: config.nativeImageBinary, homeEnv: config.homeEnv }),
      config.homeEnv,
      config.nativeImageBinary,
    )
      .exitOverride()
      .configureOutput({ writeOut: stdout, writeErr: stderr });

    let parsed: ParsedCommandLine;
    try {
      parsed = parseCommandLine(argv, program);
    } catch (err) {
      // --help, --version and usage errors; commander already printed them.
      if (err instanceof CommanderError) return err.exitCode;
      throw err;
    }

    const checked = preflight(parsed, config.homeEnv, config.nativeImageBinary);
    if (!checked.ok) {
      stderr(`${checked.error.message}\n`);
      if (checked.error.code === 'MISSING_ENTRY_UNIT') program.outputHelp({ error: true });
      return 1;
    }

    return await runBuild(
      checked.entryUnit,
      parsed.compilerArgs,
      {
        nativeImagePath: checked.nativeImagePath,
        echo: parsed.options.echo ?? false,
        precompile: parsed.options.precompile,
      },
      {
        ...buildDeps,
        env,
        compilePath: config.compilePath,
        homeEnv: config.homeEnv,
        out: (line) => stdout(`${line}\n`),
      },
    );
  } catch (err) {
    if (isAotImageError(err)) {
      stderr(`aot-image: ${err.message}\n`);
      if (isTraceEnabled() && err.stack) stderr(`${err.stack}\n`);
    } else {
      stderr(`aot-image: unexpected failure\n${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    }
    return 1;
  }
}
