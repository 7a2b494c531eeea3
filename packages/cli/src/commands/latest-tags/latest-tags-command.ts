import { ReleaseTag } from '@relkit/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Latest Tags Command Options interface
 */
export interface LatestTagsCommandOptions extends BaseCommandOptions {
  /** owner/repo to query through the GitHub API instead of the local clone */
  repo?: string;
}

/**
 * LatestTagsCommand - Reports the latest dev and stable tags
 *
 * EARS Coverage:
 * - §4.1 Tag sources (EARS-A1 to A2)
 * - §4.2 Output (EARS-B1 to B3)
 * - §4.3 Errors (EARS-C1)
 */
export class LatestTagsCommand extends BaseCommand<LatestTagsCommandOptions> {

  async execute(options: LatestTagsCommandOptions): Promise<void> {
    this.configureLogging(options);

    try {
      const latest = await this.findLatestTags(options);
      const latestDevTag = latest.latestDevTag ?? '';
      const latestStableTag = latest.latestStableTag ?? '';

      const actions = this.dependencyService.getActionsOutput();
      await actions.setOutput('latest-dev-tag', latestDevTag);
      await actions.setOutput('latest-stable-tag', latestStableTag);
      await actions.exportVariable('LATEST_DEV_TAG', latestDevTag);
      await actions.exportVariable('LATEST_STABLE_TAG', latestStableTag);

      this.printResult(
        `latest-dev-tag=${latestDevTag}\nlatest-stable-tag=${latestStableTag}`,
        latest,
        options
      );
    } catch (error) {
      this.handleCommandError(error, options);
    }
  }

  /**
   * [EARS-A1] Local clone by default
   * [EARS-A2] GitHub API with --repo
   */
  private async findLatestTags(options: LatestTagsCommandOptions): Promise<ReleaseTag.LatestTags> {
    if (options.repo) {
      const tags = await this.dependencyService.getTagSource(options.repo).listTags();
      return ReleaseTag.getLatestTags(tags);
    }

    const resolver = await this.dependencyService.getTagResolver();
    return resolver.getLatestTags();
  }
}
