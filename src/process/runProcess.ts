import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import { createInterface } from 'node:readline';

import { LaunchFailureError } from '../errors.js';
import { detectPlatform, type PlatformInfo } from '../compiler/detectPlatform.js';
import { stdoutSink, type LineSink } from '../compiler/compileTypes.js';
import { traceDebug, traceInfo } from '../dx/trace.js';

/** Launches a program and resolves with its exit code once it has exited. */
export interface ProcessRunner {
  run(executable: string, args: readonly string[], sink?: LineSink): Promise<number>;
}

export type RunProcessOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Env var named in the launch failure hint. */
  homeEnv?: string;
  /** Platform the command line is built for (default: this process's). */
  platform?: PlatformInfo;
};

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code != null) return code;
  if (signal) {
    const num = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
    return 128 + (num ?? 0);
  }
  return 1;
}

export type SpawnCommand = {
  command: string;
  args: string[];
  windowsVerbatimArguments: boolean;
};

// Characters cmd.exe treats specially; each gets a caret.
const CMD_META = /([()\][%!^"`<>&|;, *?])/g;

function escapeCmdMeta(s: string): string {
  return s.replace(CMD_META, '^$1');
}

/**
 * One argument for a .cmd/.bat launcher run through `cmd.exe /d /s /c`.
 *
 * Quoted for the C runtime's argv parser first, then caret-escaped twice:
 * once for cmd.exe and once more because the batch file re-parses `%*`.
 */
export function quoteCmdArg(arg: string): string {
  const crt = `"${arg.replace(/(\\*)"/g, '$1$1\\"').replace(/(\\*)$/, '$1$1')}"`;
  return escapeCmdMeta(escapeCmdMeta(crt));
}

/**
 * How to spawn `executable`. Node refuses to run .cmd/.bat launchers
 * directly, and its own `shell: true` joins arguments unquoted, so on
 * Windows those go through cmd.exe with a command line quoted here.
 */
export function spawnCommandFor(
  executable: string,
  args: readonly string[],
  platform: PlatformInfo,
): SpawnCommand {
  if (!platform.isWindows || !/\.(cmd|bat)$/i.test(executable)) {
    return { command: executable, args: [...args], windowsVerbatimArguments: false };
  }
  const line = [escapeCmdMeta(executable), ...args.map(quoteCmdArg)].join(' ');
  return {
    command: 'cmd.exe',
    args: ['/d', '/s', '/c', `"${line}"`],
    windowsVerbatimArguments: true,
  };
}

/**
 * Runs `executable` with `args`. Its stderr is folded into its stdout: every
 * line of either stream is handed to `sink` as soon as it is complete.
 *
 * Rejects with LaunchFailureError when the program cannot be started.
 */
export function runProcess(
  executable: string,
  args: readonly string[],
  sink: LineSink = stdoutSink,
  opts: RunProcessOptions = {},
): Promise<number> {
  return new Promise((resolve, reject) => {
    let settled = false;
    let spawned = false;

    traceInfo('process.spawn', { executable, args });

    const cmd = spawnCommandFor(executable, args, opts.platform ?? detectPlatform());
    const child = spawn(cmd.command, cmd.args, {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsVerbatimArguments: cmd.windowsVerbatimArguments,
    });

    const streams = [child.stdout, child.stderr].flatMap((stream) => {
      if (!stream) return [];
      const rl = createInterface({ input: stream, crlfDelay: Infinity });
      rl.on('line', (line) => sink(line));
      return [rl];
    });

    child.on('spawn', () => {
      spawned = true;
    });

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      for (const rl of streams) rl.close();
      reject(spawned ? err : new LaunchFailureError(executable, err, opts.homeEnv));
    });

    // 'close' fires after both pipes are drained, so every line is out by then.
    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      const exitCode = exitCodeOf(code, signal);
      traceDebug('process.exit', { executable, code, signal, exitCode });
      resolve(exitCode);
    });
  });
}

export const childProcessRunner: ProcessRunner = {
  run: (executable, args, sink) => runProcess(executable, args, sink),
};
