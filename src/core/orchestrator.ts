/**
 * Reinstall Orchestrator
 *
 * Drives one leased VM back to its baseline: stop, restore (revert or
 * re-clone), reserve its address, boot, wait for the guest, bootstrap remote
 * access, finalize. Progress is written to the VM record on entry to every
 * stage, before the stage's side effect.
 *
 * The caller must hold the VM's lease (see WorkflowTrigger); every exit path
 * of {@link ReinstallOrchestrator.run} releases it.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ResolvedConfig } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { isInsideDir, parentDir } from '../lib/paths.js';
import type { NetworkIdentityService } from '../network/reservation.js';
import type { NotificationEvent, NotificationSink } from '../notify/types.js';
import type { RecordStore } from '../state/store.js';
import type { TaskOutcome, VmRecord } from '../state/types.js';
import type { GuestCredentials, VmControl } from '../vmrun/types.js';
import { errorMessage, isVmleaseError } from './errors.js';
import {
  POWERSHELL_PATH,
  buildRemoteAccessScript,
  buildStaticAddressScript,
  guestScriptPath,
  powershellArgs,
  stagedScriptName,
  type GuestScriptKind,
} from './guest-scripts.js';
import { failureEvent, startedEvent, successEvent, warningEvent } from './notifications.js';
import { attempt, skipped, type BestEffort } from './outcome.js';
import { retryFixed, sleep as timerSleep, type Sleep } from './retry.js';
import { STAGE_PROGRESS, type RestoreBranch, type WorkflowResult, type WorkflowStage } from './types.js';

/**
 * Configuration sections the workflow reads
 */
export type WorkflowConfig = Pick<ResolvedConfig, 'template' | 'baseline' | 'network' | 'workflow'>;

/**
 * Collaborators of the orchestrator
 */
export interface OrchestratorDeps {
  store: RecordStore;
  control: VmControl;
  /** Host reservation service; reservations are skipped without one */
  network?: NetworkIdentityService;
  sink: NotificationSink;
  config: WorkflowConfig;
  /** Host directory generated guest scripts are staged in */
  scriptsDir: string;
  logger?: Logger;
  sleep?: Sleep;
  /** Removes a VM folder left behind by delete (default: recursive fs.rm) */
  removeDirectory?: (path: string) => Promise<void>;
}

/**
 * Mutable state of one run
 */
interface RunContext {
  record: VmRecord;
  log: Logger;
  stage: WorkflowStage;
  branch?: RestoreBranch;
  /** MAC address read from the VM definition during this run */
  hardwareAddress?: string;
  address?: string;
}

const STAGE_LABELS: Record<WorkflowStage, string> = {
  init: 'inspecting the VM',
  stopping: 'stopping the VM',
  restoring: 'restoring the baseline',
  networking: 'updating the network reservation',
  booting: 'starting the VM',
  waiting_for_guest: 'waiting for the guest',
  bootstrapping: 'bootstrapping remote access',
  finalizing: 'finalizing',
};

const removeDirectoryRecursive = (path: string): Promise<void> => rm(path, { recursive: true, force: true });

/**
 * Message recorded for a fatal error, with the hint of a known failure kind.
 */
export function describeFailure(stage: WorkflowStage, error: unknown): string {
  let message = `Failed while ${STAGE_LABELS[stage]}: ${errorMessage(error)}`;
  if (isVmleaseError(error) && error.suggestion) {
    message += `. ${error.suggestion}`;
  }
  return message;
}

export class ReinstallOrchestrator {
  private readonly store: RecordStore;
  private readonly control: VmControl;
  private readonly network: NetworkIdentityService | undefined;
  private readonly sink: NotificationSink;
  private readonly config: WorkflowConfig;
  private readonly scriptsDir: string;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly removeDirectory: (path: string) => Promise<void>;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.control = deps.control;
    this.network = deps.network;
    this.sink = deps.sink;
    this.config = deps.config;
    this.scriptsDir = deps.scriptsDir;
    this.logger = deps.logger ?? defaultLogger;
    this.sleep = deps.sleep ?? timerSleep;
    this.removeDirectory = deps.removeDirectory ?? removeDirectoryRecursive;
  }

  /**
   * Run the workflow to a terminal state.
   *
   * Never rejects: fatal errors are recorded on the VM record and reported
   * through the notification sink.
   */
  async run(vmId: string): Promise<WorkflowResult> {
    const log = this.logger.child(vmId);
    let record: VmRecord;
    try {
      record = await this.store.require(vmId);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Cannot load VM record: ${message}`, isVmleaseError(error) ? error : undefined);
      const released = await attempt(() => this.store.release(vmId, 'failure', message));
      if (!released.ok) {
        log.debug(`Workflow lease not released: ${released.diagnostic}`);
      }
      return { vmId, outcome: 'failure', message };
    }

    const ctx: RunContext = { record, log, stage: 'init' };
    try {
      await this.notify(ctx, startedEvent(record));

      await this.inspect(ctx);
      await this.stopVm(ctx);
      await this.restore(ctx);
      await this.reserveAddress(ctx);
      await this.boot(ctx);

      const guest = await this.waitForGuest(ctx);
      if (!guest.ok) {
        return await this.finish(ctx, 'warning', guest.diagnostic);
      }

      const bootstrap = await this.bootstrap(ctx);
      if (!bootstrap.ok) {
        return await this.finish(
          ctx,
          'warning',
          `Remote access bootstrap failed: ${bootstrap.diagnostic}. The VM is reachable through the baseline listener.`
        );
      }

      return await this.finish(ctx, 'success', null);
    } catch (error) {
      return this.fail(ctx, error);
    }
  }

  /**
   * init: learn the hardware address and, while the old guest still runs,
   * its IP address. Nothing here can fail the run.
   */
  private async inspect(ctx: RunContext): Promise<void> {
    await this.enter(ctx, 'init', STAGE_PROGRESS.init, 'Inspecting VM');
    const vmx = ctx.record.vmxPath;

    const specs = await attempt(() => this.control.readSpecs(vmx));
    if (specs.ok) {
      ctx.hardwareAddress = specs.value.hardwareAddress;
    } else {
      ctx.log.debug(`Could not read VM definition: ${specs.diagnostic}`);
    }

    if (ctx.record.networkIdentity) {
      return;
    }

    const learned = await attempt(async () => {
      if (!(await this.control.isRunning(vmx))) {
        return undefined;
      }
      return this.control.guestIp(vmx);
    });
    if (!learned.ok) {
      ctx.log.debug(`Guest address not available before stop: ${learned.diagnostic}`);
      return;
    }
    const address = learned.value;
    if (address === undefined) {
      return;
    }
    const persisted = await attempt(() => this.persistIdentity(ctx, address));
    if (!persisted.ok) {
      ctx.log.warning(`Network identity not recorded: ${persisted.diagnostic}`);
    }
  }

  private async stopVm(ctx: RunContext): Promise<void> {
    await this.enter(ctx, 'stopping', STAGE_PROGRESS.stopping, 'Stopping VM');
    const vmx = ctx.record.vmxPath;
    if (!(await this.control.isRunning(vmx))) {
      ctx.log.debug('VM is not running');
      return;
    }
    await this.control.stop(vmx, true);
    await this.sleep(this.config.workflow.stopSettleMs);
  }

  /**
   * restoring: revert to the baseline snapshot when it exists, otherwise
   * rebuild the VM from its template.
   */
  private async restore(ctx: RunContext): Promise<void> {
    const baseline = this.config.template.snapshot;
    const vmx = ctx.record.vmxPath;
    await this.enter(ctx, 'restoring', STAGE_PROGRESS.restoring, `Restoring snapshot ${baseline}`);

    const snapshots = await this.control.listSnapshots(vmx);
    if (snapshots.includes(baseline)) {
      ctx.branch = 'revert';
      await this.control.revertSnapshot(vmx, baseline);
    } else {
      ctx.branch = 'reclone';
      await this.reclone(ctx);
    }

    await this.progress(ctx, STAGE_PROGRESS.restored, `Snapshot ${baseline} restored`);
    await this.refreshHardwareAddress(ctx);
    await this.applyRemoteDisplay(ctx);
  }

  private async reclone(ctx: RunContext): Promise<void> {
    const { snapshot, cloneMode, storagePath } = this.config.template;
    const vmx = ctx.record.vmxPath;
    const source = ctx.record.templateOrigin ?? this.config.template.vmxPath;
    ctx.log.warning(`Snapshot ${snapshot} not found, re-cloning from ${source}`);

    await this.progress(ctx, 22, 'Reading hardware settings');
    const specs = await this.control.readSpecs(vmx);

    await this.progress(ctx, 25, 'Deleting VM');
    await this.control.delete(vmx);

    const folder = parentDir(vmx);
    const purge: BestEffort<void> = isInsideDir(folder, storagePath)
      ? await attempt(() => this.removeDirectory(folder))
      : skipped(`${folder} is outside ${storagePath}`);
    if (!purge.ok) {
      ctx.log.warning(`VM folder not purged: ${purge.diagnostic}`);
    }

    await this.progress(ctx, 30, `Cloning from template at ${snapshot}`);
    await this.control.clone({
      source,
      destination: vmx,
      name: ctx.record.name,
      mode: cloneMode,
      baseSnapshot: snapshot,
    });

    await this.progress(ctx, 35, `Applying ${specs.cpuCount} CPU, ${specs.memoryMb} MB`);
    await this.control.applySpecs(vmx, specs.cpuCount, specs.memoryMb);
    await this.control.createSnapshot(vmx, snapshot);
  }

  /**
   * A re-cloned VM gets a new MAC address; keep the stored identity in step.
   */
  private async refreshHardwareAddress(ctx: RunContext): Promise<void> {
    if (ctx.branch !== 'reclone') return;

    const specs = await attempt(() => this.control.readSpecs(ctx.record.vmxPath));
    if (!specs.ok) {
      ctx.log.warning(`Could not read the new hardware address: ${specs.diagnostic}`);
      return;
    }
    const mac = specs.value.hardwareAddress;
    ctx.hardwareAddress = mac;
    const identity = ctx.record.networkIdentity;
    if (mac === undefined || identity === undefined || identity.hardwareAddress === mac) return;

    ctx.record = await this.store.update(ctx.record.id, (record) => {
      record.networkIdentity = { address: identity.address, hardwareAddress: mac };
    });
    ctx.log.info(`Hardware address changed to ${mac}`);
  }

  private async applyRemoteDisplay(ctx: RunContext): Promise<void> {
    const display = ctx.record.remoteDisplay;
    if (!display?.enabled) return;

    const applied = await attempt(() =>
      this.control.setRemoteDisplay(ctx.record.vmxPath, {
        port: display.port,
        ...(display.password !== undefined ? { password: display.password } : {}),
      })
    );
    if (!applied.ok) {
      ctx.log.warning(`Remote display settings not applied: ${applied.diagnostic}`);
    }
  }

  private async reserveAddress(ctx: RunContext): Promise<void> {
    await this.enter(ctx, 'networking', STAGE_PROGRESS.networking, 'Updating network reservation');

    const identity = ctx.record.networkIdentity;
    const mac = identity?.hardwareAddress ?? ctx.hardwareAddress;
    let result: BestEffort<void>;
    if (!this.network) {
      result = skipped('no reservation service configured');
    } else if (!identity) {
      result = skipped('network identity unknown');
    } else if (mac === undefined) {
      result = skipped('hardware address unknown');
    } else {
      const service = this.network;
      result = await attempt(() => service.reserve(ctx.record.name, mac, identity.address));
    }

    if (result.ok) {
      ctx.log.info(`Reserved ${identity?.address ?? ''} for ${mac ?? ''}`);
    } else if (result.error === undefined) {
      ctx.log.debug(`Reservation skipped: ${result.diagnostic}`);
    } else {
      ctx.log.warning(`Reservation not updated: ${result.diagnostic}`);
    }
  }

  private async boot(ctx: RunContext): Promise<void> {
    await this.enter(ctx, 'booting', STAGE_PROGRESS.booting, 'Starting VM');
    await this.control.start(ctx.record.vmxPath);
  }

  /**
   * waiting_for_guest: poll for the guest address.
   *
   * Running out of attempts is a soft failure, returned as a diagnostic.
   */
  private async waitForGuest(ctx: RunContext): Promise<BestEffort<string>> {
    const { guestIpAttempts, guestIpIntervalMs } = this.config.workflow;
    const vmx = ctx.record.vmxPath;
    await this.enter(ctx, 'waiting_for_guest', STAGE_PROGRESS.waiting_for_guest, 'Waiting for guest address');

    const span = STAGE_PROGRESS.guest_ready - STAGE_PROGRESS.waiting_for_guest;
    const result = await retryFixed(
      { attempts: guestIpAttempts, intervalMs: guestIpIntervalMs, sleep: this.sleep },
      () => this.control.guestIp(vmx),
      async (attemptNumber) => {
        const progress = STAGE_PROGRESS.waiting_for_guest + Math.floor((span * attemptNumber) / guestIpAttempts);
        await this.progress(ctx, progress, `Waiting for guest address (attempt ${attemptNumber}/${guestIpAttempts})`);
      }
    );

    if (result.status === 'exhausted') {
      const diagnostic = `Guest did not report an address after ${result.attempts} attempts: ${errorMessage(result.lastError)}`;
      ctx.log.warning(diagnostic);
      return { ok: false, diagnostic, error: result.lastError };
    }

    const address = result.value;
    ctx.address = address;
    await this.progress(ctx, STAGE_PROGRESS.guest_ready, `Guest address ${address}`);

    const known = ctx.record.networkIdentity;
    if (!known) {
      await this.persistIdentity(ctx, address);
    } else if (known.address !== address) {
      const pinned = await attempt(() =>
        this.runGuestScript(
          ctx,
          'static-address',
          buildStaticAddressScript({
            address: known.address,
            subnetMask: this.config.network.subnetMask,
            gateway: this.config.network.gateway,
            dns: this.config.network.dns,
          }),
          this.config.baseline
        )
      );
      if (pinned.ok) {
        ctx.address = known.address;
        ctx.log.info(`Guest re-pinned from ${address} to ${known.address}`);
      } else {
        ctx.log.warning(`Static address not applied: ${pinned.diagnostic}`);
      }
    }
    return { ok: true, value: ctx.address };
  }

  /**
   * bootstrapping: reset the guest account to the baseline and reconfigure
   * the remote desktop listener.
   */
  private async bootstrap(ctx: RunContext): Promise<BestEffort<void>> {
    await this.enter(ctx, 'bootstrapping', STAGE_PROGRESS.bootstrapping, 'Resetting guest credentials');
    const credentials: GuestCredentials = { ...this.config.baseline };
    ctx.record = await this.store.update(ctx.record.id, (record) => {
      record.guestCredentials = { ...credentials };
    });

    const port = ctx.record.remoteAccess.port;
    const result = await attempt(() =>
      this.runGuestScript(ctx, 'remote-access', buildRemoteAccessScript(port), credentials)
    );
    if (result.ok) {
      await this.progress(ctx, STAGE_PROGRESS.bootstrapped, `Remote access listening on port ${port}`);
    } else {
      ctx.log.warning(`Remote access bootstrap failed: ${result.diagnostic}`);
      await this.progress(ctx, STAGE_PROGRESS.bootstrapped, 'Remote access bootstrap failed');
    }
    return result;
  }

  /**
   * Stage a script on the host, copy it into the guest and run it.
   */
  private async runGuestScript(
    ctx: RunContext,
    kind: GuestScriptKind,
    content: string,
    credentials: GuestCredentials
  ): Promise<void> {
    await mkdir(this.scriptsDir, { recursive: true });
    const hostPath = join(this.scriptsDir, stagedScriptName(kind, ctx.record.id, content));
    await writeFile(hostPath, content, 'utf-8');

    const guestPath = guestScriptPath(this.config.workflow.guestScriptDir, kind);
    const vmx = ctx.record.vmxPath;
    await this.control.copyToGuest(vmx, hostPath, guestPath, credentials);
    await this.control.execInGuest(vmx, POWERSHELL_PATH, powershellArgs(guestPath), credentials);
    ctx.log.debug(`Ran ${kind} script ${guestPath}`);
  }

  private async persistIdentity(ctx: RunContext, address: string): Promise<void> {
    const hardwareAddress = ctx.hardwareAddress;
    ctx.record = await this.store.update(ctx.record.id, (record) => {
      record.networkIdentity = hardwareAddress !== undefined ? { hardwareAddress, address } : { address };
    });
    ctx.log.info(`Network identity recorded: ${address}`);
  }

  private async finish(ctx: RunContext, outcome: TaskOutcome, message: string | null): Promise<WorkflowResult> {
    await this.enter(ctx, 'finalizing', STAGE_PROGRESS.finalizing, 'Finalizing');
    ctx.record = await this.store.release(ctx.record.id, outcome, message);

    if (outcome === 'success') {
      ctx.log.success('Reinstall complete');
      await this.notify(ctx, successEvent(ctx.record, this.config.baseline, ctx.address));
    } else {
      ctx.log.warning(`Reinstall finished with warnings: ${message ?? ''}`);
      await this.notify(ctx, warningEvent(ctx.record, message ?? 'Finished with warnings'));
    }

    return this.result(ctx, outcome, outcome === 'success' ? null : message);
  }

  /**
   * failed: release the lease with the error and report it.
   */
  private async fail(ctx: RunContext, error: unknown): Promise<WorkflowResult> {
    const message = describeFailure(ctx.stage, error);
    ctx.log.error(message, isVmleaseError(error) ? error : undefined);

    // Without the lease, the task state is not this run's to write
    if (isVmleaseError(error) && error.code === 'LEASE_NOT_HELD') {
      await this.notify(ctx, failureEvent(ctx.record, message));
      return this.result(ctx, 'failure', message);
    }

    const released = await attempt(() => this.store.release(ctx.record.id, 'failure', message));
    if (released.ok) {
      ctx.record = released.value;
    } else {
      ctx.log.error(`Could not release the workflow lease: ${released.diagnostic}`);
    }

    await this.notify(ctx, failureEvent(ctx.record, message));
    return this.result(ctx, 'failure', message);
  }

  private result(ctx: RunContext, outcome: TaskOutcome, message: string | null): WorkflowResult {
    const result: WorkflowResult = { vmId: ctx.record.id, outcome, message };
    if (ctx.branch) result.branch = ctx.branch;
    if (ctx.address) result.address = ctx.address;
    return result;
  }

  private async enter(ctx: RunContext, stage: WorkflowStage, progress: number, message: string): Promise<void> {
    ctx.stage = stage;
    ctx.log.info(message);
    await this.progress(ctx, progress, message);
  }

  private async progress(ctx: RunContext, progress: number, message: string): Promise<void> {
    ctx.record = await this.store.setProgress(ctx.record.id, progress, message);
  }

  /**
   * Deliver an event; a delivery failure never affects the run.
   */
  private async notify(ctx: RunContext, event: NotificationEvent): Promise<void> {
    const delivered = await attempt(() => this.sink.notify(event));
    if (!delivered.ok) {
      ctx.log.warning(`Notification '${event.subject}' not delivered: ${delivered.diagnostic}`);
    }
  }
}
