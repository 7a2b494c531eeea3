/**
 * Runner file paths. Each channel is disabled when its path is absent.
 */
export type ActionsOutputPaths = {
  /** $GITHUB_OUTPUT */
  output?: string;
  /** $GITHUB_STEP_SUMMARY */
  stepSummary?: string;
  /** $GITHUB_ENV */
  env?: string;
};

export type AppendFileFn = (path: string, data: string) => Promise<void>;

export type ActionsOutputDependencies = {
  paths: ActionsOutputPaths;
  /** Defaults to fs.promises.appendFile */
  appendFile?: AppendFileFn;
};

export interface IActionsOutput {
  setOutput(name: string, value: string): Promise<void>;
  appendSummary(markdown: string): Promise<void>;
  exportVariable(name: string, value: string): Promise<void>;
}
