import { isAbsolute, join } from 'path';
import { ConfigLoader } from './config/loader.js';
import type { PipelineConfig } from './config/schema.js';
import { ProgressAggregator } from './pipeline/aggregator.js';
import { ItemTransitions } from './pipeline/transitions.js';
import { FileLeaseManager } from './publish/file-lease.js';
import { PublishOrchestrator } from './publish/orchestrator.js';
import { CommandPublisher, type Publisher } from './publish/publisher.js';
import { ProgressReporter } from './reporting/group-report.js';
import { FileAttemptLedger } from './store/attempt-ledger.js';
import { FileItemStore } from './store/file-item-store.js';
import { configureLogDirectory } from './utils/logger.js';

export interface Pipeline {
  config: PipelineConfig;
  store: FileItemStore;
  aggregator: ProgressAggregator;
  reporter: ProgressReporter;
  orchestrator: PublishOrchestrator;
  transitions: ItemTransitions;
}

function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : join(baseDir, path);
}

/**
 * Wire the file-backed pipeline from a loaded config. Relative paths in the
 * config are taken relative to the config directory.
 */
export function createPipeline(config: PipelineConfig, configDir: string, publisher?: Publisher): Pipeline {
  if (config.logDirectory) {
    configureLogDirectory(resolvePath(configDir, config.logDirectory));
  }

  const storeDir = resolvePath(configDir, config.storeDirectory);
  const store = new FileItemStore(storeDir, config.tracks);
  const ledger = new FileAttemptLedger(storeDir);
  const aggregator = new ProgressAggregator(store, config.tracks, config.aggregationChunkSize);

  const orchestrator = new PublishOrchestrator({
    store,
    aggregator,
    ledger,
    leases: new FileLeaseManager(resolvePath(configDir, config.publish.leaseDirectory), {
      ttlMs: config.publish.leaseTtlMs,
      waitTimeoutMs: config.publish.leaseWaitMs,
    }),
    publisher:
      publisher ??
      new CommandPublisher({ command: config.publish.command, args: config.publish.args, cwd: configDir }),
    timeoutMs: config.publish.timeoutMs,
    contention: config.publish.contention,
    leaseWaitMs: config.publish.leaseWaitMs,
  });

  return {
    config,
    store,
    aggregator,
    reporter: new ProgressReporter(store, aggregator, ledger),
    orchestrator,
    transitions: new ItemTransitions(store),
  };
}

export async function loadPipeline(configDir: string): Promise<Pipeline> {
  const config = await new ConfigLoader(configDir).loadPipelineConfig();
  return createPipeline(config, configDir);
}
