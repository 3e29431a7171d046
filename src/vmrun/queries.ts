/**
 * vmrun Output Parsers
 *
 * Turns the plain-text output of vmrun query commands into values.
 */

/**
 * Normalize a `.vmx` path for comparison.
 *
 * vmrun reports running VMs with the casing and separators the host uses,
 * which need not match the path stored in a VM record.
 */
export function normalizeVmxPath(path: string): string {
  return path.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/').toLowerCase();
}

/**
 * Parse a listing whose first line is a "Total ...: N" header and whose
 * remaining non-empty lines are entries.
 */
function parseCountedList(output: string): string[] {
  const lines = output.replace(/\r/g, '').split('\n');
  const [header, ...rest] = lines;
  if (header === undefined || !/^Total\b/i.test(header.trim())) {
    return [];
  }
  return rest.map((line) => line.trim()).filter((line) => line.length > 0);
}

/**
 * Parse `vmrun list` output into normalized `.vmx` paths.
 *
 * @example
 * parseRunningList('Total running VMs: 1\nC:\\VMs\\a\\a.vmx')
 * // ['c:/vms/a/a.vmx']
 */
export function parseRunningList(output: string): string[] {
  return parseCountedList(output).map(normalizeVmxPath);
}

/**
 * Parse `vmrun listSnapshots` output into snapshot names, in listed order.
 */
export function parseSnapshotList(output: string): string[] {
  return parseCountedList(output);
}

/**
 * Check that a string is a dotted IPv4 address.
 */
export function isIPv4Address(value: string): boolean {
  const parts = value.split('.');
  if (parts.length !== 4) return false;
  return parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255);
}
