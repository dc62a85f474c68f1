#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { monthlyCommand, reportCommand } from './commands/report.js';
import { publishCommand, resolveCommand } from './commands/publish.js';
import { annotateCommand, validateCommand } from './commands/review.js';
import { serveCommand } from './commands/serve.js';
import { logger } from '../utils/logger.js';

const program = new Command();

program
  .name('rprog')
  .description(chalk.cyan('review-progress') + ' - Roll up review progress and publish finished groups')
  .version('1.0.0');

program
  .command('report')
  .description('Show the roll-up status of every group in a track')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-t, --track <id>', 'Track id')
  .option('-m, --model <name>', 'Only items of this model')
  .option('--json', 'Print group records as JSON')
  .action(reportCommand);

program
  .command('monthly')
  .description('Show items reaching each milestone per month')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-t, --track <id>', 'Track id')
  .option('-m, --model <name>', 'Only items of this model')
  .option('--json', 'Print months as JSON')
  .action(monthlyCommand);

program
  .command('publish <token>')
  .description('Publish the group named by a publish-action token')
  .option('-c, --config <path>', 'Path to config directory')
  .action(publishCommand);

program
  .command('resolve <token>')
  .description('Record the verified outcome of an uncertain publish attempt')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-o, --outcome <outcome>', 'published or failed')
  .option('-r, --reason <text>', 'Note stored with the outcome')
  .action(resolveCommand);

program
  .command('annotate <ids...>')
  .description('Mark items as annotated')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-t, --track <id>', 'Track id')
  .option('-b, --by <annotator>', 'Annotator id')
  .action(annotateCommand);

program
  .command('validate <ids...>')
  .description('Mark annotated items as validated')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-t, --track <id>', 'Track id')
  .option('-b, --by <validator>', 'Validator id')
  .action(validateCommand);

program
  .command('serve')
  .description('Serve group reports and publish actions over HTTP')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-p, --port <port>', 'Port (defaults to serverPort from the config)')
  .action(serveCommand);

program.parseAsync().catch((err: unknown) => {
  logger.error('Command failed', err);
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
