import { Command } from 'commander';
import { LatestTagsCommand } from './latest-tags-command';
import type { LatestTagsCommandOptions } from './latest-tags-command';

/**
 * Registers the latest-tags command
 */
export function registerLatestTagsCommands(program: Command): void {
  const latestTagsCommand = new LatestTagsCommand();

  program
    .command('latest-tags')
    .description('Report the latest dev and stable release tags')
    .option('--repo <owner/repo>', 'Read tags from this GitHub repository instead of the local clone')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Show debug logs and error details')
    .option('-q, --quiet', 'Only log errors')
    .action(async (options: LatestTagsCommandOptions) => {
      await latestTagsCommand.execute(options);
    });
}
