/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ResolvedConfig } from '../config/types.js';
import { ConfigLoadError } from '../config/loader.js';
import { ConfigError, getExitCode, isVmleaseError, type ErrorCode, type VmleaseError } from '../core/errors.js';
import type { VmRecord } from '../state/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  vms?: VmInfo[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
  [key: string]: unknown;
}

/**
 * VM information for status output
 */
export interface VmInfo {
  id: string;
  name: string;
  phase: string;
  progress: number;
  outcome: string | null;
  message: string | null;
  owner?: string;
  address?: string;
  expiresAt?: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * Convert a record to its status line.
 */
export function toVmInfo(record: VmRecord): VmInfo {
  const info: VmInfo = {
    id: record.id,
    name: record.name,
    phase: record.task.phase,
    progress: record.task.progress,
    outcome: record.task.outcome,
    message: record.task.message,
  };
  if (record.ownerId) info.owner = record.ownerId;
  if (record.networkIdentity) info.address = record.networkIdentity.address;
  if (record.expiresAt) info.expiresAt = record.expiresAt;
  return info;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: VmleaseError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Status Output
  // ===========================================================================

  /**
   * Print the task state of VMs.
   */
  statusTable(records: VmRecord[]): void {
    const vms = records.map(toVmInfo);

    if (this.mode === 'human') {
      if (vms.length === 0) {
        this.info('No VMs registered.');
      } else {
        const headers = ['ID', 'NAME', 'PHASE', 'PROGRESS', 'LAST', 'ADDRESS', 'MESSAGE'];
        const rows = vms.map((vm) => [
          vm.id,
          vm.name,
          vm.phase,
          `${vm.progress}%`,
          vm.outcome ?? '-',
          vm.address ?? '-',
          vm.message ?? '',
        ]);
        this.table(headers, rows);
      }
    }

    this.result.vms = vms;
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(config: ResolvedConfig): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`Template: ${config.template.vmxPath} @ ${config.template.snapshot}`);
      this.info(`Storage: ${config.template.storagePath}`);
      this.info(`Data directory: ${config.dataDir}`);
      this.info(`Reservations: ${config.network.reserveCommand ? config.network.reserveCommand.join(' ') : 'disabled'}`);
      this.dedent();
    }

    this.result.summary = {
      owners: Object.keys(config.notifications.owners).length,
    };
  }

  /**
   * Print validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Set additional data for JSON output.
   */
  setData(key: string, value: unknown): void {
    this.result[key] = value;
  }

  setSuccess(success: boolean): void {
    this.result.success = success;
  }

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}

/**
 * Report an error and exit with its exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (error instanceof ConfigLoadError) {
    output.error(error.message, new ConfigError(
      error.message,
      'CONFIG_NOT_FOUND',
      'Ensure the configuration file exists and is readable.'
    ));
  } else if (error instanceof ConfigError && error.validationErrors) {
    output.validationError(error.validationErrors);
  } else if (isVmleaseError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
