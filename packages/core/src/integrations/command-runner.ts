/**
 * @module integrations/command-runner
 * Run an argv vector without a shell and capture its output.
 */

import { spawn } from 'node:child_process';

export interface CommandOutput {
  /** null when the process could not start or was killed. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
}

/** Injectable so adapters can be tested without real binaries. */
export type CommandRunner = (argv: readonly string[], options?: RunOptions) => Promise<CommandOutput>;

const MAX_OUTPUT = 1_000_000;

export const spawnCommand: CommandRunner = (argv, options = {}) => {
  const started = Date.now();
  const [bin, ...args] = argv;
  if (bin === undefined) {
    return Promise.resolve({ exitCode: null, stdout: '', stderr: 'empty command', durationMs: 0, timedOut: false });
  }

  return new Promise<CommandOutput>((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    const proc = spawn(bin, args, {
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = options.timeoutMs
      ? setTimeout(() => {
        timedOut = true;
        proc.kill('SIGKILL');
      }, options.timeoutMs)
      : undefined;

    const done = (exitCode: number | null, extraErr = ''): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout,
        stderr: extraErr ? `${stderr}${stderr ? '\n' : ''}${extraErr}` : stderr,
        durationMs: Date.now() - started,
        timedOut,
      });
    };

    proc.stdout.on('data', (data: Buffer) => {
      if (stdout.length < MAX_OUTPUT) stdout += data.toString();
    });
    proc.stderr.on('data', (data: Buffer) => {
      if (stderr.length < MAX_OUTPUT) stderr += data.toString();
    });

    proc.on('error', (err) => done(null, `Failed to spawn ${bin}: ${err.message}`));
    proc.on('close', (code) => done(timedOut ? null : code, timedOut ? `Timed out after ${options.timeoutMs}ms` : ''));
  });
};
