import { Command } from 'commander';
import { MilestoneCommand } from './milestone-command';
import type { MilestoneCommandOptions } from './milestone-command';

/**
 * Registers the milestone command
 */
export function registerMilestoneCommands(program: Command): void {
  const milestoneCommand = new MilestoneCommand();

  program
    .command('milestone')
    .description('Create, edit or close a milestone across repositories')
    .requiredOption('-n, --name <title>', 'Milestone title (required)')
    .requiredOption('-r, --repos <owner/repo,...>', 'Comma-separated repositories (required)')
    .option('--due <YYYYMMDDhhmmss>', 'Due date, read as UTC')
    .option('--desc <text>', 'Milestone description')
    .option('--edit', 'Update the due date and description of the existing milestone')
    .option('--close', 'Close the existing milestone')
    .option('--dry-run', 'Print the requests instead of sending them')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Show debug logs and error details')
    .option('-q, --quiet', 'Only log errors')
    .action(async (options: MilestoneCommandOptions) => {
      await milestoneCommand.execute(options);
    });
}
