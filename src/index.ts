/**
 * review-progress - word-weighted roll-up of review work and guarded publishing
 *
 * Key components:
 * - ProgressAggregator: single-pass grouping of work items
 * - resolveStatus: ordered rule list from percentages to a group label
 * - PublishOrchestrator: lease-guarded publish with an attempt ledger
 * - ProgressReporter: group records and monthly counts for reporting
 */

// Aggregation and status resolution
export {
  ProgressAggregator,
  GroupAccumulator,
  aggregateItems,
  aggregateChunks,
  groupIdentity,
  toPercentage,
  type AggregateOptions,
  type StreamAggregateOptions,
} from './pipeline/aggregator.js';
export {
  resolveStatus,
  toStatusPercentages,
  isPublishable,
  RESOLUTION_RULES,
  PUBLISHABLE_STATUSES,
  type StatusPercentages,
  type ResolutionRule,
} from './pipeline/status-resolver.js';
export { countWords, measureItem, deriveGroupKey } from './pipeline/word-count.js';
export { publishActionToken, parsePublishActionToken, isTokenSafeKey } from './pipeline/token.js';
export { ItemTransitions, type TransitionResult } from './pipeline/transitions.js';
export * from './pipeline/errors.js';

// Publishing
export { PublishOrchestrator, type PublishResult, type PublishRejection } from './publish/orchestrator.js';
export { CommandPublisher, type Publisher, type PublishOutcome, type PublishPayload } from './publish/publisher.js';
export { InProcessLeaseManager, type LeaseManager, type Lease, type ContentionMode } from './publish/lease.js';
export { FileLeaseManager } from './publish/file-lease.js';

// Storage
export { InMemoryItemStore, type ItemStore, type ItemReader } from './store/item-store.js';
export { FileItemStore } from './store/file-item-store.js';
export { InMemoryAttemptLedger, FileAttemptLedger, type AttemptLedger } from './store/attempt-ledger.js';

// Reporting
export { ProgressReporter, type GroupRecord } from './reporting/group-report.js';
export { monthlyProgress, type MonthlyProgress } from './reporting/monthly-progress.js';
export { ReportServer } from './server.js';

// Configuration and wiring
export { ConfigLoader } from './config/loader.js';
export { PipelineConfigSchema, type PipelineConfig } from './config/schema.js';
export { createPipeline, loadPipeline, type Pipeline } from './runtime.js';

// Types
export type {
  ItemStatus,
  ResolvedStatus,
  GroupKey,
  WorkItem,
  TrackDefinition,
  ItemSelector,
  GroupRef,
  Group,
  StatusTotals,
  StatusWrite,
  AttemptState,
  PublishAttempt,
} from './pipeline/types.js';
export { ITEM_STATUSES } from './pipeline/types.js';
