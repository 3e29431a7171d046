/**
 * Verbose Output Helpers
 *
 * Formats vmrun invocations for --verbose CLI output.
 * Used exclusively by VmrunExecutor to print commands to stderr
 * before execution.
 */

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[vmrun] ';

/**
 * Placeholder printed instead of a guest password.
 */
export const REDACTED = '******';

/**
 * ANSI SGR 90 — bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0 — reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Replace the value following every `-gp` flag.
 */
export function redactArgs(args: readonly string[]): string[] {
  return args.map((arg, i) => (i > 0 && args[i - 1] === '-gp' ? REDACTED : arg));
}

/**
 * Quote an argument for display when it contains whitespace or quotes.
 */
function quoteArg(arg: string): string {
  if (arg === '' || /[\s"]/.test(arg)) {
    return `"${arg.replace(/"/g, '\\"')}"`;
  }
  return arg;
}

/**
 * Render an invocation as a single redacted command line.
 *
 * @param executable - Path to vmrun
 * @param args - Full argument vector, including host type and credentials
 */
export function formatCommandLine(executable: string, args: readonly string[]): string {
  return [executable, ...redactArgs(args)].map(quoteArg).join(' ');
}

/**
 * Format a vmrun invocation for verbose output.
 *
 * Produces a line fenced by blank lines, optionally wrapped in ANSI gray.
 *
 * @param executable - Path to vmrun
 * @param args - Full argument vector
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(executable: string, args: readonly string[], ansi: boolean): string {
  const plain = `\n${PREFIX}${formatCommandLine(executable, args)}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
