/**
 * Network Identity Service
 *
 * Pins a VM's hardware address to a reserved IP address on the host network.
 * The reservation store itself (DHCP configuration, NAT tables) belongs to an
 * operator-provided command; vmlease only asks it to upsert.
 */

import { ReservationError, errorMessage } from '../core/errors.js';
import { runProcess, type CommandRunner, type ProcessResult } from '../lib/process.js';

/**
 * Upserts address reservations keyed by VM name.
 */
export interface NetworkIdentityService {
  /**
   * Create or replace the reservation for a VM.
   *
   * @throws ReservationError if the reservation cannot be written or activated
   */
  reserve(vmName: string, hardwareAddress: string, address: string): Promise<void>;
}

/**
 * Reservation service that delegates to a host command.
 *
 * The command is run as `<command...> <vm-name> <hardware-address> <address>`
 * and must exit 0 once the reservation is active. Running it twice with the
 * same arguments must be harmless.
 */
export class CommandReservationService implements NetworkIdentityService {
  constructor(
    private readonly command: readonly string[],
    private readonly runner: CommandRunner = runProcess,
    private readonly timeout: number = 60000
  ) {
    if (command.length === 0) {
      throw new Error('Reservation command must not be empty');
    }
  }

  async reserve(vmName: string, hardwareAddress: string, address: string): Promise<void> {
    const [file, ...baseArgs] = this.command;
    if (file === undefined) {
      throw new ReservationError('Reservation command is empty', vmName);
    }

    let result: ProcessResult;
    try {
      result = await this.runner(file, [...baseArgs, vmName, hardwareAddress, address], this.timeout);
    } catch (error) {
      throw new ReservationError(
        `Reservation for ${vmName} could not be run: ${errorMessage(error)}`,
        vmName,
        error instanceof Error ? error : undefined
      );
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
      throw new ReservationError(`Reservation for ${vmName} failed: ${detail}`, vmName);
    }
  }
}
