import { promises as fs } from 'fs';
import { createLogger } from '../logger';
import type {
  ActionsOutputDependencies,
  ActionsOutputPaths,
  AppendFileFn,
  IActionsOutput,
} from './actions_output.types';

const logger = createLogger('[ActionsOutput] ');

const BASE_DELIMITER = 'EOF';

export class ActionsOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActionsOutputError';
    Object.setPrototypeOf(this, ActionsOutputError.prototype);
  }
}

/**
 * Picks a heredoc delimiter that does not occur as a line of `value`.
 */
export function chooseDelimiter(value: string): string {
  const lines = new Set(value.split(/\r?\n/));
  let delimiter = BASE_DELIMITER;
  for (let suffix = 1; lines.has(delimiter); suffix++) {
    delimiter = `${BASE_DELIMITER}_${suffix}`;
  }
  return delimiter;
}

/**
 * Formats one `name=value` entry for the runner's key-value files.
 * Multi-line values use the `name<<DELIMITER` form.
 */
export function formatKeyValue(name: string, value: string): string {
  if (!name || /[=\r\n]/.test(name)) {
    throw new ActionsOutputError(`Invalid output name: ${JSON.stringify(name)}`);
  }

  if (!/[\r\n]/.test(value)) {
    return `${name}=${value}\n`;
  }

  const delimiter = chooseDelimiter(value);
  return `${name}<<${delimiter}\n${value}\n${delimiter}\n`;
}

/**
 * ActionsOutput - Step outputs, job summary and exported variables
 *
 * Appends to the files the CI runner names through GITHUB_OUTPUT,
 * GITHUB_STEP_SUMMARY and GITHUB_ENV. Outside a runner every call is a no-op.
 */
export class ActionsOutput implements IActionsOutput {
  private readonly paths: ActionsOutputPaths;
  private readonly appendFile: AppendFileFn;

  constructor(deps: ActionsOutputDependencies) {
    this.paths = deps.paths;
    this.appendFile = deps.appendFile ?? ((path, data) => fs.appendFile(path, data, 'utf8'));
  }

  async setOutput(name: string, value: string): Promise<void> {
    await this.write(this.paths.output, formatKeyValue(name, value), `output "${name}"`);
  }

  async appendSummary(markdown: string): Promise<void> {
    const data = markdown.endsWith('\n') ? markdown : `${markdown}\n`;
    await this.write(this.paths.stepSummary, data, 'step summary');
  }

  async exportVariable(name: string, value: string): Promise<void> {
    await this.write(this.paths.env, formatKeyValue(name, value), `variable "${name}"`);
  }

  private async write(path: string | undefined, data: string, what: string): Promise<void> {
    if (!path) {
      logger.debug(`Skipping ${what}: runner file not configured`);
      return;
    }
    await this.appendFile(path, data);
    logger.debug(`Wrote ${what} to ${path}`);
  }
}
