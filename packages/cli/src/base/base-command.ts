/**
 * Base Command Class for the relkit CLI
 *
 * Shared error/success output, logging flags and access to the dependency
 * container.
 */

import { Logger } from '@relkit/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Raised by commands for invalid invocations (missing arguments)
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * --verbose turns on debug logs, --quiet silences everything but errors;
   * without either flag LOG_LEVEL applies. Logs go to stderr either way.
   */
  protected configureLogging(options: TOptions): void {
    if (options.verbose) {
      Logger.setDefaultLogLevel('debug');
    } else if (options.quiet) {
      Logger.setDefaultLogLevel('error');
    } else {
      Logger.setDefaultLogLevel(this.dependencyService.getRuntimeConfig().logLevel);
    }
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error?.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Reports any thrown value through handleError
   */
  protected handleCommandError(error: unknown, options: TOptions): void {
    if (error instanceof UsageError) {
      this.handleError(error.message, options, error);
    } else if (error instanceof Error) {
      this.handleError(`Error: ${error.message}`, options, error);
    } else {
      this.handleError('Unknown error occurred', options);
    }
  }

  /**
   * Prints a command payload on stdout, as JSON with --json
   */
  protected printResult(text: string, data: object, options: TOptions): void {
    if (options.json) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      console.log(text);
    }
  }
}
