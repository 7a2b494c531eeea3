import { Command } from 'commander';
import { ResolveTagCommand } from './resolve-tag-command';
import type { ResolveTagCommandOptions } from './resolve-tag-command';

/**
 * Registers the resolve-tag command
 */
export function registerResolveTagCommands(program: Command): void {
  const resolveTagCommand = new ResolveTagCommand();

  program
    .command('resolve-tag')
    .description('Print the tag or commit a release should be compared against')
    .argument('[release_tag]', 'Release tag (default: $RELEASE_TAG, or the tag of $GITHUB_REF)')
    .argument('[previous_tag]', 'Use this reference instead of resolving one (default: $PREVIOUS_TAG)')
    .option('--json', 'Output the resolution as JSON')
    .option('-v, --verbose', 'Show debug logs and error details')
    .option('-q, --quiet', 'Only log errors')
    .action(async (releaseTag: string | undefined, previousTag: string | undefined, options: ResolveTagCommandOptions) => {
      await resolveTagCommand.execute(releaseTag, previousTag, options);
    });
}
