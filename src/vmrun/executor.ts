/**
 * vmrun Executor
 *
 * Runs VMware's `vmrun` tool and classifies its failures.
 */

import { VmControlError, errorMessage, type VmControlErrorKind } from '../core/errors.js';
import { ProcessRunError, runProcess, type CommandRunner, type ProcessResult } from '../lib/process.js';
import type { GuestCredentials } from './types.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error thrown when a vmrun invocation fails
 */
export class VmrunError extends VmControlError {
  constructor(
    message: string,
    kind: VmControlErrorKind,
    operation: string,
    public readonly processExitCode: number | null,
    public readonly output: string
  ) {
    super(message, kind, operation);
    this.name = 'VmrunError';
    Object.setPrototypeOf(this, VmrunError.prototype);
  }
}

/**
 * Options for a single vmrun invocation
 */
export interface ExecuteOptions {
  /** Guest account for guest operations (-gu / -gp) */
  credentials?: GuestCredentials;
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
}

/**
 * Options for constructing a VmrunExecutor
 */
export interface VmrunExecutorOptions {
  /** Path to the vmrun executable (default: 'vmrun') */
  vmrunPath?: string;
  /** Host type passed with -T (default: 'ws', VMware Workstation) */
  hostType?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
  /** Process runner (default: child_process.spawn) */
  runner?: CommandRunner;
}

const OUTPUT_PATTERNS: Array<{ kind: VmControlErrorKind; needles: string[] }> = [
  {
    kind: 'AUTH_REJECTED',
    needles: [
      'invalid user name or password',
      'anonymous guest operations are not allowed',
      'authentication failure',
      'access is denied',
    ],
  },
  {
    kind: 'NOT_READY',
    needles: [
      'vmware tools are not running',
      'tools are not running in the virtual machine',
      'unable to get the ip address',
      'the guest operating system is not ready',
      'guest operations agent could not be contacted',
    ],
  },
  {
    kind: 'UNAVAILABLE',
    needles: ['unable to connect to host', 'cannot connect to the host'],
  },
];

/**
 * Classify vmrun output into a VM control failure kind.
 *
 * vmrun reports failures as free text on stdout ("Error: ..."); this is the
 * only place that text is interpreted.
 */
export function classifyVmrunOutput(output: string): VmControlErrorKind {
  const lower = output.toLowerCase();
  for (const { kind, needles } of OUTPUT_PATTERNS) {
    if (needles.some((needle) => lower.includes(needle))) {
      return kind;
    }
  }
  return 'UNKNOWN';
}

/**
 * Pick the most informative line of vmrun output for an error message.
 */
export function extractErrorDetail(output: string, exitCode: number | null): string {
  const lines = output
    .replace(/\r/g, '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.find((line) => line.startsWith('Error:'));
  if (errorLine) {
    return errorLine.slice('Error:'.length).trim();
  }
  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }
  return `vmrun exited with code ${exitCode}`;
}

/**
 * Executes vmrun commands and returns their standard output.
 */
export class VmrunExecutor {
  private readonly vmrunPath: string;
  private readonly hostType: string;
  private readonly verbose: boolean;
  private readonly runner: CommandRunner;

  constructor(options?: VmrunExecutorOptions) {
    this.vmrunPath = options?.vmrunPath ?? 'vmrun';
    this.hostType = options?.hostType ?? 'ws';
    this.verbose = options?.verbose ?? false;
    this.runner = options?.runner ?? runProcess;
  }

  /**
   * Get the executable this executor spawns.
   */
  getVmrunPath(): string {
    return this.vmrunPath;
  }

  /**
   * Build the full argument vector for a command.
   */
  buildArgv(args: readonly string[], credentials?: GuestCredentials): string[] {
    const argv = ['-T', this.hostType];
    if (credentials) {
      argv.push('-gu', credentials.username, '-gp', credentials.password);
    }
    argv.push(...args);
    return argv;
  }

  /**
   * Run a vmrun command.
   *
   * @param args - Command and its arguments, e.g. from buildStartArgs()
   * @param options - Execution options
   * @returns Trimmed standard output
   * @throws VmrunError if vmrun cannot be spawned, times out or exits non-zero
   */
  async execute(args: string[], options: ExecuteOptions = {}): Promise<string> {
    const { timeout = 120000, credentials } = options;
    const operation = args[0] ?? 'unknown';
    const argv = this.buildArgv(args, credentials);

    if (this.verbose) {
      process.stderr.write(formatCommand(this.vmrunPath, argv, supportsAnsi()));
    }

    let result: ProcessResult;
    try {
      result = await this.runner(this.vmrunPath, argv, timeout);
    } catch (error) {
      if (error instanceof ProcessRunError && error.reason === 'timeout') {
        throw new VmrunError(`vmrun ${operation} timed out after ${timeout}ms`, 'UNKNOWN', operation, null, '');
      }
      throw new VmrunError(
        `Failed to run vmrun at ${this.vmrunPath}: ${errorMessage(error)}`,
        'UNAVAILABLE',
        operation,
        null,
        ''
      );
    }

    if (result.exitCode !== 0) {
      // vmrun prints most errors on stdout
      const output = `${result.stdout}\n${result.stderr}`;
      throw new VmrunError(
        `vmrun ${operation} failed: ${extractErrorDetail(output, result.exitCode)}`,
        classifyVmrunOutput(output),
        operation,
        result.exitCode,
        output.trim()
      );
    }

    return result.stdout.trim();
  }

  /**
   * Run a vmrun command whose output is not needed.
   */
  async executeVoid(args: string[], options: ExecuteOptions = {}): Promise<void> {
    await this.execute(args, options);
  }
}
