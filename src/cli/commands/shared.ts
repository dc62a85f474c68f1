import chalk from 'chalk';

export function requireConfig(config: string | undefined, command: string): string {
  if (!config) {
    console.log(chalk.red('Error: --config is required'));
    console.log(chalk.gray(`Usage: rprog ${command} --config <path>`));
    process.exit(1);
  }
  return config;
}

export function parseTrackOption(track: string | undefined): number {
  if (!track || !/^\d+$/.test(track)) {
    console.log(chalk.red(`Error: --track must be a track id, got ${track ?? 'nothing'}`));
    process.exit(1);
  }
  return Number(track);
}
