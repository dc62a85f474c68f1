import chalk from 'chalk';
import { loadPipeline } from '../../runtime.js';
import { parsePublishActionToken } from '../../pipeline/token.js';
import type { GroupRef } from '../../pipeline/types.js';
import type { PublishResult } from '../../publish/orchestrator.js';
import { requireConfig } from './shared.js';

interface PublishOptions {
  config?: string;
}

interface ResolveOptions extends PublishOptions {
  outcome?: string;
  reason?: string;
}

function parseToken(token: string): GroupRef {
  const ref = parsePublishActionToken(token);
  if (!ref) {
    console.log(chalk.red(`Error: not a publish-action token: "${token}"`));
    process.exit(1);
  }
  return ref;
}

function printResult(result: PublishResult): void {
  const group = `${result.ref.groupKey.join(' / ')} (track ${result.ref.trackId})`;

  switch (result.outcome) {
    case 'published':
      console.log(chalk.green(`✓ Published ${group}: ${result.itemIds.length} item(s)`));
      if (result.reference) {
        console.log(chalk.gray(`  Reference: ${result.reference}`));
      }
      return;
    case 'failed':
      console.log(chalk.red(`✗ Publish failed for ${group}`));
      console.log(chalk.gray(`  Reason: ${result.reason}`));
      console.log(chalk.gray(`  ${result.itemIds.length} item(s) marked PUBLISH_FAILED; retry with "rprog publish" when fixed`));
      process.exitCode = 1;
      return;
    case 'uncertain':
      console.log(chalk.magenta(`? Publish outcome unknown for ${group}`));
      console.log(chalk.gray(`  ${result.reason}`));
      console.log(chalk.yellow('  Verify with the publishing system, then record the outcome:'));
      console.log(chalk.gray('    rprog resolve <token> --outcome published|failed'));
      process.exitCode = 2;
      return;
    case 'rejected':
      console.log(chalk.yellow(`⚠️  Not published (${result.rejection}): ${result.message}`));
      process.exitCode = 1;
      return;
  }
}

/**
 * Publish command handler
 */
export async function publishCommand(token: string, options: PublishOptions): Promise<void> {
  const configDir = requireConfig(options.config, 'publish');
  const ref = parseToken(token);
  const pipeline = await loadPipeline(configDir);
  await pipeline.orchestrator.recoverInFlight();
  printResult(await pipeline.orchestrator.publish(ref));
}

/**
 * Resolve command handler - record the verified outcome of an uncertain attempt
 */
export async function resolveCommand(token: string, options: ResolveOptions): Promise<void> {
  const configDir = requireConfig(options.config, 'resolve');
  if (options.outcome !== 'published' && options.outcome !== 'failed') {
    console.log(chalk.red('Error: --outcome must be "published" or "failed"'));
    process.exit(1);
  }
  const outcome = options.outcome;
  const ref = parseToken(token);
  const pipeline = await loadPipeline(configDir);
  await pipeline.orchestrator.recoverInFlight();
  printResult(await pipeline.orchestrator.resolveUncertain(ref, outcome, options.reason));
}
