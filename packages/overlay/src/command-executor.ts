/**
 * Command executor for the local overlay agent CLI.
 *
 * Resolves the agent binary once at construction and runs it with a hard
 * timeout. A timed-out process is killed with SIGKILL. Results come back as
 * an explicit union; nothing here retries or throws for control flow.
 *
 * @module overlay/command-executor
 */
import { execFile } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from '@netglass/shared/logger';
import { noopLogger } from '@netglass/shared/logger';

/** Platform install locations checked before `PATH`. */
const AGENT_PATHS: Record<string, string[]> = {
  linux: ['/usr/bin/tailscale', '/usr/sbin/tailscale', '/usr/local/bin/tailscale'],
  darwin: ['/Applications/Tailscale.app/Contents/MacOS/Tailscale', '/usr/local/bin/tailscale'],
  win32: ['C:\\Program Files\\Tailscale\\tailscale.exe'],
};

const MAX_STDOUT_BYTES = 16 * 1024 * 1024;

/** Arguments for a full JSON status dump. */
export const STATUS_ARGS = ['status', '--json'] as const;

export interface ExecutionSuccess {
  kind: 'success';
  stdout: Buffer;
}

export interface ExecutionTimeout {
  kind: 'timeout';
  timeoutMs: number;
}

export interface ExecutionFailure {
  kind: 'failure';
  exitCode: number | null;
  stderr: string;
}

export type ExecutionResult = ExecutionSuccess | ExecutionTimeout | ExecutionFailure;

/** Options passed through to the process runner. */
export interface RunOptions {
  timeout: number;
  killSignal: 'SIGKILL';
  maxBuffer: number;
  windowsHide: boolean;
}

/** Error shape reported by `child_process.execFile`. */
export interface RunError {
  message: string;
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

/** Narrow process runner, `execFile` in production and a stub in tests. */
export type ProcessRunner = (
  file: string,
  args: readonly string[],
  options: RunOptions,
  callback: (error: RunError | null, stdout: Buffer, stderr: Buffer) => void,
) => void;

const defaultRunner: ProcessRunner = (file, args, options, callback) => {
  execFile(file, [...args], { ...options, encoding: 'buffer' }, (error, stdout, stderr) => {
    callback(error, stdout, stderr);
  });
};

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export interface ResolveAgentBinaryOptions {
  configuredPath?: string | null;
  platform?: NodeJS.Platform;
  envPath?: string;
  isExecutable?: (candidate: string) => boolean;
}

/**
 * Find the agent binary: configured path, platform install locations, then
 * every `PATH` entry. Falls back to the bare binary name so the OS resolves it.
 */
export function resolveAgentBinary(options: ResolveAgentBinaryOptions = {}): string {
  const platform = options.platform ?? process.platform;
  const isExecutable = options.isExecutable ?? isExecutableFile;
  const binaryName = platform === 'win32' ? 'tailscale.exe' : 'tailscale';

  if (options.configuredPath) return options.configuredPath;

  const delimiter = platform === 'win32' ? ';' : ':';
  const pathDirs = (options.envPath ?? process.env.PATH ?? '').split(delimiter).filter(Boolean);
  const join = platform === 'win32' ? path.win32.join : path.posix.join;
  const candidates = [
    ...(AGENT_PATHS[platform] ?? []),
    ...pathDirs.map((dir) => join(dir, binaryName)),
  ];

  return candidates.find((candidate) => isExecutable(candidate)) ?? binaryName;
}

export interface CommandExecutorOptions {
  binaryPath?: string | null;
  runner?: ProcessRunner;
  logger?: Logger;
  resolve?: (configuredPath: string | null) => string;
}

/** Runs the agent CLI. One call spawns exactly one process. */
export class CommandExecutor {
  readonly binaryPath: string;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: CommandExecutorOptions = {}) {
    const resolve = options.resolve ?? ((configuredPath) => resolveAgentBinary({ configuredPath }));
    this.binaryPath = resolve(options.binaryPath ?? null);
    this.runner = options.runner ?? defaultRunner;
    this.logger = options.logger ?? noopLogger;
    this.logger.debug(`using agent binary at ${this.binaryPath}`);
  }

  /** Run the agent with `args`, hard-killing it after `timeoutMs`. */
  run(args: readonly string[], timeoutMs: number): Promise<ExecutionResult> {
    return new Promise((resolve) => {
      this.runner(
        this.binaryPath,
        args,
        { timeout: timeoutMs, killSignal: 'SIGKILL', maxBuffer: MAX_STDOUT_BYTES, windowsHide: true },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ kind: 'success', stdout });
            return;
          }
          resolve(classifyRunError(error, stderr, timeoutMs));
        },
      );
    });
  }
}

function classifyRunError(error: RunError, stderr: Buffer, timeoutMs: number): ExecutionResult {
  if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return { kind: 'failure', exitCode: null, stderr: 'agent output exceeded buffer limit' };
  }
  if (error.killed && error.signal === 'SIGKILL') {
    return { kind: 'timeout', timeoutMs };
  }
  const text = stderr.toString('utf8');
  return {
    kind: 'failure',
    exitCode: typeof error.code === 'number' ? error.code : null,
    // Spawn errors (ENOENT, EACCES) have no stderr, only a message
    stderr: text || error.message,
  };
}
