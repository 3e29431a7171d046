/**
 * CLI Runtime
 *
 * Wires the vmrun adapter, record store, reservation service and webhook
 * sink into an orchestrator and trigger for one CLI invocation.
 */

import type { ResolvedConfig } from '../config/types.js';
import { ReinstallOrchestrator } from '../core/orchestrator.js';
import { WorkflowTrigger } from '../core/trigger.js';
import { configureLogger, type Logger } from '../lib/logger.js';
import { getRecordsPath, getScriptsDir } from '../lib/paths.js';
import { CommandReservationService, type NetworkIdentityService } from '../network/reservation.js';
import { WebhookNotificationSink } from '../notify/webhook.js';
import { RecordStore } from '../state/store.js';
import { VmrunControl } from '../vmrun/control.js';
import { VmrunExecutor } from '../vmrun/executor.js';

/**
 * Options shared by every command that touches the hypervisor
 */
export interface RuntimeOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface Runtime {
  config: ResolvedConfig;
  logger: Logger;
  store: RecordStore;
  control: VmrunControl;
  network?: NetworkIdentityService;
  sink: WebhookNotificationSink;
  orchestrator: ReinstallOrchestrator;
  trigger: WorkflowTrigger;
}

/**
 * Build the collaborators for a resolved configuration.
 *
 * In JSON mode the workflow log is kept in memory so it does not mix with
 * the command's JSON document.
 */
export function createRuntime(config: ResolvedConfig, options: RuntimeOptions): Runtime {
  const logger = configureLogger({ mode: options.json ? 'silent' : 'human', verbose: options.verbose === true });

  const executor = new VmrunExecutor({
    vmrunPath: config.hypervisor.vmrunPath,
    hostType: config.hypervisor.hostType,
    verbose: options.verbose,
  });
  const control = new VmrunControl(executor, { startMode: config.hypervisor.startMode });
  const store = new RecordStore(getRecordsPath(config.dataDir));
  const network = config.network.reserveCommand
    ? new CommandReservationService(config.network.reserveCommand)
    : undefined;
  const sink = new WebhookNotificationSink({
    operatorWebhook: config.notifications.operatorWebhook,
    owners: config.notifications.owners,
    logger,
  });

  const orchestrator = new ReinstallOrchestrator({
    store,
    control,
    network,
    sink,
    config,
    scriptsDir: getScriptsDir(config.dataDir),
    logger,
  });
  const trigger = new WorkflowTrigger(store, orchestrator, logger);

  return { config, logger, store, control, network, sink, orchestrator, trigger };
}
