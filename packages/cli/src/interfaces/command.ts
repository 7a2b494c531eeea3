/**
 * Standard Command Interface for the relkit CLI
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Registers one command group on the Commander.js program
 */
export type CommandRegistrar = (program: Command) => void;
