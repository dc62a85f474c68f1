import { groupIdentity, type AggregateOptions, type ProgressAggregator } from '../pipeline/aggregator.js';
import { publishActionToken } from '../pipeline/token.js';
import { isUnresolved } from '../publish/orchestrator.js';
import type { AttemptState, Group, GroupKey, ItemSelector, ResolvedStatus, StatusTotals } from '../pipeline/types.js';
import type { AttemptLedger } from '../store/attempt-ledger.js';
import type { ItemReader } from '../store/item-store.js';
import { monthlyProgress, type MonthlyProgress } from './monthly-progress.js';

/** Group as handed to the reporting layer */
export interface GroupRecord {
  trackId: number;
  groupKey: GroupKey;
  itemCount: number;
  totalWordCount: number;
  percentages: StatusTotals;
  lastInsertion: Date;
  lastAnnotation: Date | null;
  resolvedStatus: ResolvedStatus;
  /** False while the latest publish attempt is unresolved or no token can name the group */
  publishEligible: boolean;
  publishAction: string;
  lastAttempt: { state: AttemptState; reason: string | null; finishedAt: Date | null } | null;
}

export class ProgressReporter {
  constructor(
    private readonly items: ItemReader,
    private readonly aggregator: ProgressAggregator,
    private readonly ledger: AttemptLedger
  ) {}

  async groups(selector: ItemSelector, options: AggregateOptions = {}): Promise<GroupRecord[]> {
    const [groups, attempts] = await Promise.all([
      this.aggregator.aggregate(selector, options),
      this.ledger.list({ trackId: selector.trackId }),
    ]);
    const attemptsByGroup = new Map(attempts.map((attempt) => [groupIdentity(attempt), attempt]));

    return groups.map((group: Group): GroupRecord => {
      const attempt = attemptsByGroup.get(groupIdentity(group)) ?? null;
      const publishAction = publishActionToken(group);
      return {
        trackId: group.trackId,
        groupKey: group.groupKey,
        itemCount: group.itemCount,
        totalWordCount: group.totalWordCount,
        percentages: group.percentages,
        lastInsertion: group.lastInsertion,
        lastAnnotation: group.lastAnnotation,
        resolvedStatus: group.resolvedStatus,
        publishEligible: group.publishEligible && !isUnresolved(attempt) && publishAction !== '',
        publishAction,
        lastAttempt: attempt ? { state: attempt.state, reason: attempt.reason, finishedAt: attempt.finishedAt } : null,
      };
    });
  }

  async monthly(selector: ItemSelector): Promise<MonthlyProgress[]> {
    return monthlyProgress(await this.items.readItems(selector));
  }
}
