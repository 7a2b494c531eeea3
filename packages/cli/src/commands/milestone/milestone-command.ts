import { GitHub } from '@relkit/core';
import { BaseCommand, UsageError } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Milestone Command Options interface
 */
export interface MilestoneCommandOptions extends BaseCommandOptions {
  name?: string;
  /** Comma-separated owner/repo list */
  repos?: string;
  /** YYYYMMDDhhmmss */
  due?: string;
  desc?: string;
  edit?: boolean;
  close?: boolean;
  dryRun?: boolean;
}

export const MILESTONE_USAGE = 'Usage: relkit milestone --name <title> --repos <owner/repo,...>';

type MilestoneFailure = {
  repository: string;
  error: string;
};

/**
 * MilestoneCommand - Applies one milestone change to several repositories
 *
 * Repositories are processed in order; a failure is reported and the next
 * repository is still processed. The exit code is 1 when any failed.
 *
 * EARS Coverage:
 * - §4.1 Argument handling (EARS-A1 to A4)
 * - §4.2 Output (EARS-B1 to B3)
 * - §4.3 Errors (EARS-C1 to C2)
 */
export class MilestoneCommand extends BaseCommand<MilestoneCommandOptions> {

  async execute(options: MilestoneCommandOptions): Promise<void> {
    this.configureLogging(options);

    let results: GitHub.MilestoneResult[];
    let failures: MilestoneFailure[];
    try {
      const title = options.name?.trim();
      const repositories = (options.repos ?? '')
        .split(',')
        .map((repository) => repository.trim())
        .filter((repository) => repository.length > 0);

      if (!title || repositories.length === 0) {
        throw new UsageError(`${MILESTONE_USAGE}\nA milestone name and at least one repository are required`);
      }

      const config = this.dependencyService.getRuntimeConfig();
      if (!options.dryRun && !config.githubToken) {
        throw new UsageError('GITHUB_TOKEN is required to change milestones (use --dry-run to preview)');
      }

      const request: GitHub.MilestoneRequest = {
        title,
        edit: options.edit ?? false,
        close: options.close ?? false,
        dryRun: options.dryRun ?? false,
      };
      if (options.due) request.dueOn = GitHub.parseMilestoneDueDate(options.due);
      if (options.desc) request.description = options.desc;

      ({ results, failures } = await this.applyAll(repositories, request, options));
    } catch (error) {
      this.handleCommandError(error, options);
      return;
    }

    if (options.json || results.length > 0) {
      this.printResult(
        results.map(formatResult).join('\n'),
        { success: failures.length === 0, results, failures },
        options
      );
    }

    if (failures.length > 0) {
      process.exit(1);
    }
  }

  /**
   * [EARS-C1] One failing repository does not stop the others
   */
  private async applyAll(
    repositories: string[],
    request: GitHub.MilestoneRequest,
    options: MilestoneCommandOptions
  ): Promise<{ results: GitHub.MilestoneResult[]; failures: MilestoneFailure[] }> {
    const manager = this.dependencyService.getMilestoneManager();
    const results: GitHub.MilestoneResult[] = [];
    const failures: MilestoneFailure[] = [];

    for (const repository of repositories) {
      try {
        results.push(await manager.apply(repository, request));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ repository, error: message });
        if (!options.json) {
          console.error(`❌ ${repository}: ${message}`);
        }
      }
    }

    return { results, failures };
  }
}

function formatResult(result: GitHub.MilestoneResult): string {
  const number = result.number !== undefined ? ` (#${result.number})` : '';

  switch (result.action) {
    case 'dry-run':
      return result.request
        ? `[DRY RUN] ${result.repository}: would ${result.request.method} ${result.request.path} ${JSON.stringify(result.request.payload)}`
        : `[DRY RUN] ${result.repository}: nothing to send`;
    case 'not-found':
      return `⚠️ ${result.repository}: milestone "${result.title}" not found`;
    default:
      return `✅ ${result.repository}: ${result.action} milestone "${result.title}"${number}`;
  }
}
