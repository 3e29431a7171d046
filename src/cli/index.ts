#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { validateCommand } from './commands/validate.js';
import { registerCommand, type RegisterCommandOptions } from './commands/register.js';
import { statusCommand } from './commands/status.js';
import { reinstallCommand } from './commands/reinstall.js';
import { recoverCommand } from './commands/recover.js';
import { expiryCheckCommand } from './commands/expiry-check.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('vmlease')
  .description('Reinstall and recycle leased VMware Workstation VMs')
  .version(packageJson.version)
  .option('--verbose', 'Print vmrun commands before execution');

/**
 * Verbose option description shared across all commands that run vmrun.
 */
const VERBOSE_DESC = 'Print vmrun commands before execution';

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   vmlease --verbose reinstall file vm-1    (parent parses --verbose)
 *   vmlease reinstall file vm-1 --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T & { verbose: boolean } {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

program
  .command('validate <file>')
  .description('Validate YAML configuration against schema')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

program
  .command('register <file>')
  .description('Add a VM to the records, or update a registered one')
  .requiredOption('--id <id>', 'Stable VM identifier')
  .option('--name <name>', 'Display name; keys the network reservation')
  .option('--vmx <path>', 'Path to the VM .vmx file')
  .option('--owner <owner>', 'Tenant that leases the VM')
  .option('--template <path>', 'Template .vmx to re-clone from (default: template.vmx_path)')
  .option('--remote-host <host>', 'Remote desktop host tenants connect to')
  .option('--remote-port <port>', 'Remote desktop port (default: 3389)')
  .option('--remote-user <user>', 'Remote desktop username (default: baseline.username)')
  .option('--address <ip>', 'Reserved guest IPv4 address')
  .option('--mac <mac>', 'Hardware address of the first adapter')
  .option('--vnc-port <port>', 'Enable the VNC console on this port')
  .option('--vnc-password <password>', 'VNC console password')
  .option('--expires-at <date>', 'End of the lease')
  .option('--json', 'Output as JSON')
  .action((file: string, opts: RegisterCommandOptions) => registerCommand(file, opts));

program
  .command('status <file> [vm]')
  .description('Show workflow state of registered VMs')
  .option('--json', 'Output as JSON')
  .action((file: string, vm: string | undefined, opts: { json?: boolean }) => statusCommand(file, vm, opts));

program
  .command('reinstall <file> <vm>')
  .description('Restore a VM to its baseline snapshot, re-cloning it if the snapshot is gone')
  .option('--wait', 'Follow progress until the workflow finishes')
  .option('--no-preflight', 'Skip host checks')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, vm: string, opts: { json?: boolean; verbose?: boolean; wait?: boolean; preflight?: boolean }) =>
    reinstallCommand(file, vm, withGlobalOpts(opts))
  );

program
  .command('recover <file>')
  .description('Reset workflows abandoned by a process that died')
  .option('--json', 'Output as JSON')
  .action(recoverCommand);

program
  .command('expiry-check <file>')
  .description('Notify owners whose lease has ended')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((file: string, opts: { json?: boolean; verbose?: boolean }) => expiryCheckCommand(file, withGlobalOpts(opts)));

program.parse();
