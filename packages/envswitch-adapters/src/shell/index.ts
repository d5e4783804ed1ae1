export { CommandError, runCommand } from './run-command';
export type { CommandResult, CommandRunner, RunCommandOptions } from './run-command';
