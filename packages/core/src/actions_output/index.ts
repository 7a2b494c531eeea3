export { ActionsOutput, ActionsOutputError, chooseDelimiter, formatKeyValue } from './actions_output';
export type {
  ActionsOutputPaths,
  AppendFileFn,
  ActionsOutputDependencies,
  IActionsOutput,
} from './actions_output.types';
