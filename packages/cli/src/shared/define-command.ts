import type { CommandContext } from './context.js';

export interface CliCommand {
  name: string;
  description: string;
  /** Positional arguments in commander syntax, e.g. `<version>` */
  arguments?: string;
  /** Whether the command accepts the stage flags (branch, run number, probe, ...) */
  stageOptions?: boolean;
  /** Resolves to the process exit code */
  handler(ctx: CommandContext, args: string[]): Promise<number>;
}

export function defineCommand(command: CliCommand): CliCommand {
  return command;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
