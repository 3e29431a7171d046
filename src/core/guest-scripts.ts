/**
 * Guest Script Builders
 *
 * Builds the PowerShell scripts pushed into Windows guests. Every script
 * can be run repeatedly against a freshly restored baseline image.
 */

import { computeContentHash } from '../lib/hash.js';

/**
 * Interpreter used to run staged scripts. vmrun requires a full guest path.
 */
export const POWERSHELL_PATH = 'C:\\Windows\\System32\\WindowsPowerShell\\v1.0\\powershell.exe';

/**
 * Kinds of script the workflow stages
 */
export type GuestScriptKind = 'remote-access' | 'static-address';

/**
 * Escape a string for safe use in PowerShell single-quoted strings.
 * Single quotes in PowerShell are escaped by doubling them.
 */
export function escapePowerShellString(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Convert a dotted subnet mask to a prefix length.
 *
 * @example
 * maskToPrefixLength('255.255.255.0') // 24
 * @throws Error if the mask is not a contiguous run of leading ones
 */
export function maskToPrefixLength(mask: string): number {
  const octets = mask.split('.').map((part) => Number(part));
  if (octets.length !== 4 || octets.some((o) => !Number.isInteger(o) || o < 0 || o > 255)) {
    throw new Error(`Invalid subnet mask: ${mask}`);
  }
  const bits = octets.map((o) => o.toString(2).padStart(8, '0')).join('');
  if (!/^1*0*$/.test(bits)) {
    throw new Error(`Invalid subnet mask: ${mask}`);
  }
  return bits.indexOf('0') === -1 ? 32 : bits.indexOf('0');
}

/**
 * Build the remote desktop bootstrap script.
 *
 * Enables the listener, moves it to `port`, opens the firewall for TCP and
 * UDP on that port and restarts the service. Firewall rules are replaced by
 * name, so reruns never stack duplicates.
 */
export function buildRemoteAccessScript(port: number): string {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid remote access port: ${port}`);
  }
  return `
$ErrorActionPreference = 'Stop'
$port = ${port}
$ts = 'HKLM:\\System\\CurrentControlSet\\Control\\Terminal Server'
Set-ItemProperty -Path $ts -Name 'fDenyTSConnections' -Value 0
Set-ItemProperty -Path "$ts\\WinStations\\RDP-Tcp" -Name 'PortNumber' -Value $port
foreach ($protocol in @('TCP', 'UDP')) {
  $name = "vmlease-remote-access-$protocol"
  Get-NetFirewallRule -Name $name -ErrorAction SilentlyContinue | Remove-NetFirewallRule
  New-NetFirewallRule -Name $name -DisplayName "Remote Desktop ($protocol $port)" -Direction Inbound -Protocol $protocol -LocalPort $port -Action Allow | Out-Null
}
Restart-Service -Name 'TermService' -Force
`.trim();
}

/**
 * Parameters for pinning a guest to its reserved address
 */
export interface StaticAddressParams {
  address: string;
  subnetMask: string;
  gateway: string;
  dns: string[];
}

/**
 * Build the static addressing script.
 *
 * Replaces the IPv4 configuration of the first connected adapter when it
 * does not already carry `address`, then sets the DNS servers.
 */
export function buildStaticAddressScript(params: StaticAddressParams): string {
  const address = escapePowerShellString(params.address);
  const gateway = escapePowerShellString(params.gateway);
  const prefixLength = maskToPrefixLength(params.subnetMask);
  const dns = params.dns.map((server) => `'${escapePowerShellString(server)}'`).join(', ');

  return `
$ErrorActionPreference = 'Stop'
$adapter = Get-NetAdapter | Where-Object { $_.Status -eq 'Up' } | Sort-Object -Property ifIndex | Select-Object -First 1
if (-not $adapter) { throw 'No connected network adapter' }
$index = $adapter.ifIndex
$current = @(Get-NetIPAddress -InterfaceIndex $index -AddressFamily IPv4 -ErrorAction SilentlyContinue | ForEach-Object { $_.IPAddress })
if ($current -notcontains '${address}') {
  Set-NetIPInterface -InterfaceIndex $index -Dhcp Disabled
  Get-NetIPAddress -InterfaceIndex $index -AddressFamily IPv4 -ErrorAction SilentlyContinue | Remove-NetIPAddress -Confirm:$false
  Get-NetRoute -InterfaceIndex $index -DestinationPrefix '0.0.0.0/0' -ErrorAction SilentlyContinue | Remove-NetRoute -Confirm:$false
  New-NetIPAddress -InterfaceIndex $index -IPAddress '${address}' -PrefixLength ${prefixLength} -DefaultGateway '${gateway}' | Out-Null
}
Set-DnsClientServerAddress -InterfaceIndex $index -ServerAddresses @(${dns})
`.trim();
}

/**
 * File name a script is staged under on the host.
 *
 * The content hash keeps concurrent runs for different VMs and different
 * script versions apart.
 */
export function stagedScriptName(kind: GuestScriptKind, vmId: string, content: string): string {
  const safeId = vmId.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${kind}-${safeId}-${computeContentHash(content)}.ps1`;
}

/**
 * Guest path a script of the given kind is copied to.
 */
export function guestScriptPath(guestDir: string, kind: GuestScriptKind): string {
  return `${guestDir.replace(/[\\/]+$/, '')}\\vmlease-${kind}.ps1`;
}

/**
 * Interpreter arguments that run a copied script file.
 */
export function powershellArgs(scriptPath: string): string[] {
  return ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-File', scriptPath];
}
