/**
 * VMX Definition Helpers
 *
 * Reads and edits the `key = "value"` entries of a VMware `.vmx` file.
 * Keys are matched case-insensitively; untouched lines are preserved.
 */

import type { RemoteDisplaySettings, VmSpecs } from './types.js';

const ENTRY_PATTERN = /^\s*([A-Za-z0-9_.:]+)\s*=\s*"(.*)"\s*$/;

/**
 * Parse a `.vmx` file into a map keyed by lower-cased entry name.
 */
export function parseVmx(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.replace(/\r/g, '').split('\n')) {
    const match = ENTRY_PATTERN.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      entries.set(match[1].toLowerCase(), match[2]);
    }
  }
  return entries;
}

/**
 * Set entries in a `.vmx` file, replacing existing keys in place and
 * appending new ones at the end.
 *
 * @returns Updated file content
 */
export function updateVmx(content: string, updates: Record<string, string>): string {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const pending = new Map(Object.entries(updates).map(([key, value]) => [key.toLowerCase(), { key, value }]));

  const lines = content.length > 0 ? content.split(/\r?\n/) : [];
  const out = lines.map((line) => {
    const match = ENTRY_PATTERN.exec(line);
    const existingKey = match?.[1];
    if (existingKey === undefined) return line;
    const update = pending.get(existingKey.toLowerCase());
    if (!update) return line;
    pending.delete(existingKey.toLowerCase());
    return `${existingKey} = "${update.value}"`;
  });

  // Trailing blank lines collapse into the single EOL added below
  while (out.length > 0 && out[out.length - 1] === '') {
    out.pop();
  }
  for (const { key, value } of pending.values()) {
    out.push(`${key} = "${value}"`);
  }
  return out.join(eol) + eol;
}

function positiveInteger(entries: Map<string, string>, key: string, fallback?: string): number {
  const raw = entries.get(key) ?? fallback;
  if (raw === undefined) {
    throw new Error(`${key} is missing`);
  }
  const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Read CPU, memory and the first adapter's MAC address.
 *
 * A VM without `numvcpus` runs with one CPU. A static `ethernet0.address`
 * takes precedence over the generated one.
 *
 * @throws Error if `memsize` is missing or either value is not a positive integer
 */
export function readVmxSpecs(content: string): VmSpecs {
  const entries = parseVmx(content);
  const specs: VmSpecs = {
    cpuCount: positiveInteger(entries, 'numvcpus', '1'),
    memoryMb: positiveInteger(entries, 'memsize'),
  };
  const mac = entries.get('ethernet0.address') ?? entries.get('ethernet0.generatedaddress');
  if (mac) {
    specs.hardwareAddress = mac.toLowerCase();
  }
  return specs;
}

/**
 * Entries that set CPU count and memory.
 */
export function specsEntries(cpuCount: number, memoryMb: number): Record<string, string> {
  return {
    numvcpus: String(cpuCount),
    memsize: String(memoryMb),
  };
}

/**
 * Entries that enable the built-in VNC server.
 */
export function remoteDisplayEntries(settings: RemoteDisplaySettings): Record<string, string> {
  const entries: Record<string, string> = {
    'RemoteDisplay.vnc.enabled': 'TRUE',
    'RemoteDisplay.vnc.port': String(settings.port),
  };
  if (settings.password !== undefined) {
    entries['RemoteDisplay.vnc.password'] = settings.password;
  }
  return entries;
}
