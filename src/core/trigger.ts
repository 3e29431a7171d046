/**
 * Workflow Trigger
 *
 * Accepts requests to reinstall a VM and schedules the orchestrator without
 * blocking the caller. At most one workflow runs per VM: the store's
 * `idle → running` transition is the lock.
 */

import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import type { RecordStore } from '../state/store.js';
import { errorMessage } from './errors.js';
import type { WorkflowResult } from './types.js';

/**
 * Anything that can run a workflow for a VM whose lease is held
 */
export interface WorkflowRunner {
  run(vmId: string): Promise<WorkflowResult>;
}

/**
 * Acknowledgment returned by {@link WorkflowTrigger.begin}
 */
export type BeginResult =
  | { accepted: true }
  | { accepted: false; reason: 'already-running' | 'not-found' };

/**
 * Schedules a callback on a later turn of the event loop.
 */
export type Scheduler = (callback: () => void) => void;

const nextTurn: Scheduler = (callback) => {
  setImmediate(callback);
};

export class WorkflowTrigger {
  private readonly inFlight = new Map<string, Promise<WorkflowResult | undefined>>();

  constructor(
    private readonly store: RecordStore,
    private readonly runner: WorkflowRunner,
    private readonly logger: Logger = defaultLogger,
    private readonly schedule: Scheduler = nextTurn
  ) {}

  /**
   * Take the VM's lease and schedule a run.
   *
   * Returns as soon as the lease is taken. A VM that already runs a
   * workflow is refused and nothing else happens.
   */
  async begin(vmId: string): Promise<BeginResult> {
    const lease = await this.store.tryAcquire(vmId, 'Queued');
    if (!lease.acquired) {
      this.logger.debug(`Reinstall of ${vmId} refused: ${lease.reason}`);
      return { accepted: false, reason: lease.reason };
    }

    const run = new Promise<WorkflowResult>((resolve, reject) => {
      this.schedule(() => {
        this.runner.run(vmId).then(resolve, reject);
      });
    }).catch(async (error: unknown) => {
      const message = `Workflow crashed: ${errorMessage(error)}`;
      this.logger.error(`${vmId}: ${message}`);
      try {
        await this.store.release(vmId, 'failure', message);
      } catch (releaseError) {
        this.logger.error(`${vmId}: lease not released: ${errorMessage(releaseError)}`);
      }
      return undefined;
    });

    this.inFlight.set(vmId, run);
    void run.finally(() => {
      if (this.inFlight.get(vmId) === run) {
        this.inFlight.delete(vmId);
      }
    });

    return { accepted: true };
  }

  /**
   * Check whether this process is running a workflow for the VM.
   */
  isActive(vmId: string): boolean {
    return this.inFlight.has(vmId);
  }

  /**
   * Wait for the VM's current run, if any.
   *
   * @returns the run's result, or undefined when nothing ran or it crashed
   */
  async settled(vmId: string): Promise<WorkflowResult | undefined> {
    return this.inFlight.get(vmId);
  }

  /**
   * Wait for every run started through this trigger.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }
}
