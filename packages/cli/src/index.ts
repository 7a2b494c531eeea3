#!/usr/bin/env node

import { Command } from 'commander';
import { registerResolveTagCommands } from './commands/resolve-tag/resolve-tag';
import { registerChangelogCommands } from './commands/changelog/changelog';
import { registerLatestTagsCommands } from './commands/latest-tags/latest-tags';
import { registerMilestoneCommands } from './commands/milestone/milestone';
import type { CommandRegistrar } from './interfaces/command';

const registrars: CommandRegistrar[] = [
  registerResolveTagCommands,
  registerChangelogCommands,
  registerLatestTagsCommands,
  registerMilestoneCommands,
];

/**
 * Builds the relkit program with every command registered
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('relkit')
    .description('Release tags, changelogs and milestones for CI pipelines')
    .version('0.1.0');

  for (const register of registrars) {
    register(program);
  }

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
