/**
 * Path Utilities
 *
 * Provides path expansion and resolution for configuration and data files.
 */

import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve, win32 } from 'node:path';

/**
 * Name of the data directory created beside the config file by default.
 */
export const DEFAULT_DATA_DIR = '.vmlease';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * Both Windows-style `%VAR%` and Unix-style `$VAR` references are replaced
 * from the environment; unknown variables expand to an empty string.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded.startsWith('~')) {
    // Either separator may follow ~; join adds the platform's own
    expanded = join(homedir(), expanded.slice(1).replace(/^[\\/]/, ''));
  }

  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Windows drive paths are absolute even when resolved on another platform
  if (!isAbsolute(expanded) && !isWindowsAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Check for a drive-letter or UNC path (`C:\VMs`, `\\host\share`).
 */
export function isWindowsAbsolute(path: string): boolean {
  return /^[A-Za-z]:[\\/]/.test(path) || path.startsWith('\\\\');
}

/**
 * Get the data directory for a given config file.
 *
 * @param configPath - Path to the configuration file
 * @returns Absolute path to the .vmlease directory beside the config file
 */
export function getDefaultDataDir(configPath: string): string {
  return join(dirname(resolve(configPath)), DEFAULT_DATA_DIR);
}

/**
 * Get the VM record file inside a data directory.
 */
export function getRecordsPath(dataDir: string): string {
  return join(dataDir, 'records.json');
}

/**
 * Get the directory where generated guest scripts are staged before
 * they are copied into a guest.
 */
export function getScriptsDir(dataDir: string): string {
  return join(dataDir, 'scripts');
}

/**
 * Parent directory of a path, honouring Windows separators for drive and
 * UNC paths on any host.
 */
export function parentDir(path: string): string {
  return isWindowsAbsolute(path) ? win32.dirname(path) : dirname(path);
}

/**
 * Check that `child` lies strictly inside `parent`.
 *
 * Comparison ignores case and separator style, as VMware hosts are
 * usually Windows.
 */
export function isInsideDir(child: string, parent: string): boolean {
  const normalize = (p: string): string => p.replace(/\\/g, '/').replace(/\/+$/, '').toLowerCase();
  const c = normalize(child);
  const p = normalize(parent);
  return p.length > 0 && c.startsWith(`${p}/`) && c.length > p.length + 1;
}
