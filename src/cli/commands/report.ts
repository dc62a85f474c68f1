import chalk from 'chalk';
import { loadPipeline } from '../../runtime.js';
import type { GroupRecord } from '../../reporting/group-report.js';
import type { ResolvedStatus } from '../../pipeline/types.js';
import { parseTrackOption, requireConfig } from './shared.js';

interface ReportOptions {
  config?: string;
  track?: string;
  model?: string;
  json?: boolean;
}

const STATUS_COLORS: Record<ResolvedStatus, (text: string) => string> = {
  PENDING: chalk.gray,
  ANNOTATED: chalk.cyan,
  VALIDATED: chalk.green,
  PUBLISHED: chalk.blue,
  PUBLISH_FAILED: chalk.red,
  WIP: chalk.yellow,
};

function formatDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : '-';
}

function formatRow(record: GroupRecord): string {
  const status = STATUS_COLORS[record.resolvedStatus](record.resolvedStatus.padEnd(14));
  const attempt =
    record.lastAttempt?.state === 'UNCERTAIN' ? chalk.magenta(' [uncertain: verify before re-publishing]') : '';
  return [
    record.groupKey.join(' / ').padEnd(32),
    status,
    String(record.totalWordCount).padStart(8),
    `${record.percentages.VALIDATED.toFixed(2).padStart(6)}%`,
    formatDate(record.lastInsertion),
    formatDate(record.lastAnnotation),
    record.publishEligible ? chalk.white(record.publishAction) : '',
  ].join('  ') + attempt;
}

/**
 * Report command handler - one line per group of a track
 */
export async function reportCommand(options: ReportOptions): Promise<void> {
  const configDir = requireConfig(options.config, 'report');
  const trackId = parseTrackOption(options.track);
  const pipeline = await loadPipeline(configDir);
  const groups = await pipeline.reporter.groups({ trackId, model: options.model });

  if (options.json) {
    console.log(JSON.stringify(groups, null, 2));
    return;
  }

  const track = pipeline.aggregator.getTrack(trackId);
  console.log(chalk.cyan(`\n${track.name} (track ${trackId}) - ${groups.length} group(s)\n`));

  if (groups.length === 0) {
    console.log(chalk.gray('  No items for this track'));
    return;
  }

  console.log(
    chalk.gray(
      [
        'GROUP'.padEnd(32),
        'STATUS'.padEnd(14),
        'WORDS'.padStart(8),
        'VALID.'.padStart(7),
        'INSERTED  ',
        'ANNOTATED ',
        'PUBLISH ACTION',
      ].join('  ')
    )
  );
  for (const record of groups) {
    console.log(formatRow(record));
  }
  console.log();
}

/**
 * Monthly command handler - items reaching each milestone per month
 */
export async function monthlyCommand(options: ReportOptions): Promise<void> {
  const configDir = requireConfig(options.config, 'monthly');
  const trackId = parseTrackOption(options.track);
  const pipeline = await loadPipeline(configDir);
  const months = await pipeline.reporter.monthly({ trackId, model: options.model });

  if (options.json) {
    console.log(JSON.stringify(months, null, 2));
    return;
  }

  console.log(chalk.gray(['MONTH  ', 'ANNOTATED', 'VALIDATED', 'PUBLISHED', 'FAILED'].join('  ')));
  for (const { month, counts } of months) {
    console.log(
      [
        month,
        String(counts.ANNOTATED).padStart(9),
        String(counts.VALIDATED).padStart(9),
        String(counts.PUBLISHED).padStart(9),
        String(counts.PUBLISH_FAILED).padStart(6),
      ].join('  ')
    );
  }
}
