import { promises as fs } from 'fs';
import { Config } from '@relkit/core';
import { BaseCommand, UsageError } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Changelog Command Options interface
 */
export interface ChangelogCommandOptions extends BaseCommandOptions {
  output?: string;
  repository?: string;
  serverUrl?: string;
  strict?: boolean;
}

export const CHANGELOG_USAGE = 'Usage: relkit changelog <release_tag> [previous_tag]';

export const DEFAULT_CHANGELOG_PATH = 'changelog.md';

/**
 * ChangelogCommand - Renders the changelog of a release
 *
 * Writes the document to changelog.md (or --output) and prints the same
 * bytes on stdout. In CI the document also becomes the `changelog` step
 * output and is appended to the job summary.
 *
 * EARS Coverage:
 * - §4.1 Argument handling (EARS-A1 to A4)
 * - §4.2 Output (EARS-B1 to B4)
 * - §4.3 Errors (EARS-C1 to C4)
 * - §4.4 Logging (EARS-D1 to D2)
 */
export class ChangelogCommand extends BaseCommand<ChangelogCommandOptions> {

  /**
   * [EARS-A2] Resolves the previous tag when none is given
   * [EARS-A3] Usage error without a release tag, nothing written
   * [EARS-B1] File and stdout are byte-identical
   * [EARS-C4] stdout is written before the runner files
   */
  async execute(
    releaseTagArg: string | undefined,
    previousTagArg: string | undefined,
    options: ChangelogCommandOptions
  ): Promise<void> {
    this.configureLogging(options);

    try {
      const config = this.dependencyService.getRuntimeConfig();
      const releaseTag = releaseTagArg || config.releaseTag;

      if (!releaseTag) {
        throw new UsageError(`${CHANGELOG_USAGE}\nA release tag is required`);
      }

      const previousTag = previousTagArg || config.previousTag || await this.resolvePreviousTag(releaseTag);
      const git = await this.dependencyService.getGitModule();
      const repository = await Config.resolveRepository(options.repository, config, git);

      const generator = await this.dependencyService.getChangelogGenerator();
      const { markdown } = await generator.generate({
        releaseTag,
        previousTag,
        links: { serverUrl: options.serverUrl || config.serverUrl, repository },
        strict: options.strict ?? false,
      });

      await fs.writeFile(options.output || DEFAULT_CHANGELOG_PATH, markdown, 'utf8');
      process.stdout.write(markdown);

      const actions = this.dependencyService.getActionsOutput();
      await actions.setOutput('changelog', markdown);
      await actions.appendSummary(markdown);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  private async resolvePreviousTag(releaseTag: string): Promise<string> {
    const resolver = await this.dependencyService.getTagResolver();
    const resolved = await resolver.resolvePreviousTag(releaseTag);
    return resolved.previousTag;
  }
}
