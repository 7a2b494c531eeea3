import { BaseCommand, UsageError } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Resolve Tag Command Options interface
 */
export type ResolveTagCommandOptions = BaseCommandOptions;

export const RESOLVE_TAG_USAGE = 'Usage: relkit resolve-tag <release_tag> [previous_tag]';

/**
 * ResolveTagCommand - Prints the reference a release is diffed against
 *
 * EARS Coverage:
 * - §4.1 Argument handling (EARS-A1 to A4)
 * - §4.2 Output (EARS-B1 to B3)
 * - §4.3 Errors (EARS-C1 to C2)
 * - §4.4 Logging (EARS-D1 to D2)
 */
export class ResolveTagCommand extends BaseCommand<ResolveTagCommandOptions> {

  /**
   * [EARS-A1] Positional arguments win over RELEASE_TAG / PREVIOUS_TAG
   * [EARS-A3] Usage error without a release tag
   * [EARS-B1] Plain output is the reference alone
   * [EARS-B2] --json prints the full resolution
   * [EARS-B3] previous-tag step output
   */
  async execute(
    releaseTagArg: string | undefined,
    previousTagArg: string | undefined,
    options: ResolveTagCommandOptions
  ): Promise<void> {
    this.configureLogging(options);

    try {
      const config = this.dependencyService.getRuntimeConfig();
      const releaseTag = releaseTagArg || config.releaseTag;
      const previousTag = previousTagArg || config.previousTag;

      if (!releaseTag) {
        throw new UsageError(`${RESOLVE_TAG_USAGE}\nA release tag is required`);
      }

      const resolver = await this.dependencyService.getTagResolver();
      const resolved = await resolver.resolvePreviousTag(releaseTag, previousTag);

      await this.dependencyService.getActionsOutput().setOutput('previous-tag', resolved.previousTag);

      this.printResult(resolved.previousTag, resolved, options);
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }
}
