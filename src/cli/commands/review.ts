import chalk from 'chalk';
import { loadPipeline } from '../../runtime.js';
import type { TransitionResult } from '../../pipeline/transitions.js';
import { parseTrackOption, requireConfig } from './shared.js';

interface ReviewOptions {
  config?: string;
  track?: string;
  by?: string;
}

function printTransition(label: string, result: TransitionResult): void {
  console.log(chalk.green(`✓ ${result.updated.length} item(s) ${label}`));
  for (const skipped of result.skipped) {
    const reason = skipped.status ? `status is ${skipped.status}` : 'not found';
    console.log(chalk.yellow(`  skipped ${skipped.id}: ${reason}`));
  }
}

async function runReview(kind: 'annotate' | 'validate', ids: string[], options: ReviewOptions): Promise<void> {
  const configDir = requireConfig(options.config, kind);
  const trackId = parseTrackOption(options.track);
  if (!options.by) {
    console.log(chalk.red('Error: --by <reviewer id> is required'));
    process.exit(1);
  }

  const { transitions } = await loadPipeline(configDir);
  const result =
    kind === 'annotate'
      ? await transitions.annotate(trackId, ids, options.by)
      : await transitions.validate(trackId, ids, options.by);
  printTransition(kind === 'annotate' ? 'annotated' : 'validated', result);
}

export function annotateCommand(ids: string[], options: ReviewOptions): Promise<void> {
  return runReview('annotate', ids, options);
}

export function validateCommand(ids: string[], options: ReviewOptions): Promise<void> {
  return runReview('validate', ids, options);
}
