/**
 * Process Runner
 *
 * Runs a host command to completion and captures its output.
 */

import { spawn } from 'node:child_process';

/**
 * Captured result of a finished process
 */
export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Raised when a command could not be started or did not finish in time.
 * A non-zero exit is not an error at this level.
 */
export class ProcessRunError extends Error {
  constructor(
    message: string,
    public readonly reason: 'spawn' | 'timeout'
  ) {
    super(message);
    this.name = 'ProcessRunError';
  }
}

/**
 * Runs a command; rejects only when it cannot be started or times out.
 */
export type CommandRunner = (file: string, args: string[], timeout?: number) => Promise<ProcessResult>;

/**
 * Default CommandRunner backed by child_process.spawn.
 */
export const runProcess: CommandRunner = (file, args, timeout = 60000) => {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(file, args, { windowsHide: true });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timeoutId = setTimeout(() => {
      settled = true;
      child.kill('SIGTERM');
      reject(new ProcessRunError(`${file} timed out after ${timeout}ms`, 'timeout'));
    }, timeout);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error: Error) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      reject(new ProcessRunError(error.message, 'spawn'));
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timeoutId);
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, stdout, stderr });
    });
  });
};
