import type { IGitModule } from '../git';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { ChangelogBuilder, renderChangelog } from './changelog_builder';
import type {
  ChangelogGeneratorDependencies,
  GenerateChangelogOptions,
  GeneratedChangelog,
  IChangelogGenerator,
} from './changelog_builder.types';

/**
 * ChangelogGenerator - Reads the commit range previousTag..releaseTag and
 * renders it as a categorized changelog.
 *
 * Commit order is kept exactly as the git module returns it.
 */
export class ChangelogGenerator implements IChangelogGenerator {
  private readonly git: IGitModule;
  private readonly logger: Logger;

  constructor(dependencies: ChangelogGeneratorDependencies) {
    this.git = dependencies.git;
    this.logger = dependencies.logger ?? createLogger('[ChangelogGenerator] ');
  }

  async generate(options: GenerateChangelogOptions): Promise<GeneratedChangelog> {
    // Validate the release tag before touching git
    const builder = new ChangelogBuilder(options, this.logger);

    const commits = await this.git.getCommitLog(options.previousTag, options.releaseTag);
    this.logger.info(`Found ${commits.length} commits between ${options.previousTag} and ${options.releaseTag}`);

    const document = builder.addAll(commits).build();
    return { document, markdown: renderChangelog(document), commits };
  }
}
