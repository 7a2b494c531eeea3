import { Command } from 'commander';
import { ChangelogCommand, DEFAULT_CHANGELOG_PATH } from './changelog-command';
import type { ChangelogCommandOptions } from './changelog-command';

/**
 * Registers the changelog command
 */
export function registerChangelogCommands(program: Command): void {
  const changelogCommand = new ChangelogCommand();

  program
    .command('changelog')
    .description('Render the categorized changelog between two references')
    .argument('[release_tag]', 'Release tag (default: $RELEASE_TAG, or the tag of $GITHUB_REF)')
    .argument('[previous_tag]', 'Start of the range (default: $PREVIOUS_TAG, else resolved)')
    .option('-o, --output <path>', 'File to write', DEFAULT_CHANGELOG_PATH)
    .option('--repository <owner/repo>', 'Repository for commit links (default: $GITHUB_REPOSITORY, else origin)')
    .option('--server-url <url>', 'Server for commit links (default: $GITHUB_SERVER_URL or https://github.com)')
    .option('--strict', 'Fail when the release tag has no YYYY.MM family')
    .option('-v, --verbose', 'Show debug logs and error details')
    .option('-q, --quiet', 'Only log errors')
    .action(async (releaseTag: string | undefined, previousTag: string | undefined, options: ChangelogCommandOptions) => {
      await changelogCommand.execute(releaseTag, previousTag, options);
    });
}
