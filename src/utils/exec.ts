/**
 * Child-process runner for the external tools (terraform, ansible-playbook, ssh)
 */

import { spawn } from 'node:child_process';
import { CommandError } from '../errors.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the child after this many ms */
  timeoutMs?: number;
  /** Kill the child when aborted */
  signal?: AbortSignal;
  /** Receives stdout/stderr text as it arrives (e.g. to tee into the log) */
  onOutput?: (text: string, stream: 'stdout' | 'stderr') => void;
}

export interface CommandOutput {
  /** null when the child was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Non-zero exits resolve; callers decide what
 * an exit code means. Only a failure to spawn rejects.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandOutput>;

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(a => (/[\s'"]/.test(a) ? JSON.stringify(a) : a)).join(' ');
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise<CommandOutput>((resolve, reject) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs,
      signal: options.signal,
    });

    child.stdout.on('data', (buf: Buffer) => {
      stdout.push(buf);
      options.onOutput?.(buf.toString('utf8'), 'stdout');
    });
    child.stderr.on('data', (buf: Buffer) => {
      stderr.push(buf);
      options.onOutput?.(buf.toString('utf8'), 'stderr');
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      // An abort surfaces here too; report it like a killed child
      if (err.name === 'AbortError') {
        resolve({
          exitCode: null,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
        return;
      }
      reject(new CommandError(formatCommand(command, args), null, err.message));
    });
    child.on('close', (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
};
