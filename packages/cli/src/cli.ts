import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { ConfigError, errorMessage, isPipelineError } from '@pubwatch/core';
import { buildCommand } from './commands/build.js';
import { infoCommand } from './commands/info.js';
import { publishCommand } from './commands/publish.js';
import { runCommand } from './commands/run.js';
import { versionCommand } from './commands/version.js';
import { waitCommand } from './commands/wait.js';
import { workflowCommand } from './commands/workflow.js';
import { createCommandContext, defaultDeps, type CliDeps } from './shared/context.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, type CliCommand } from './shared/define-command.js';
import { addGlobalOptions, addStageOptions, parseCliOptions } from './shared/options.js';

export const commands: CliCommand[] = [
  infoCommand,
  versionCommand,
  buildCommand,
  publishCommand,
  waitCommand,
  runCommand,
  workflowCommand,
];

export const CLI_VERSION = '0.1.0';

/**
 * Run the CLI and resolve to the exit code; never calls process.exit itself
 */
export async function cli(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };
  let exitCode = EXIT_OK;

  const program = new Command()
    .name('pubwatch')
    .description('Build, publish and confirm availability of a Poetry package')
    .version(CLI_VERSION, '-v, --version', 'Show CLI version')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.stdout(text),
      writeErr: (text) => deps.io.stderr(text),
    })
    .addHelpText(
      'after',
      `
${chalk.gray('Examples:')}
  ${chalk.cyan('pubwatch build')}                          Install dependencies
  ${chalk.cyan('pubwatch publish --package tap-powerbi-metadata')}
  ${chalk.cyan('pubwatch wait 1.2.0-dev.42 --probe pip')}  Poll only
`
    );
  addGlobalOptions(program);

  for (const definition of commands) {
    const sub = program.command(definition.name).description(definition.description);
    if (definition.arguments) {
      sub.argument(definition.arguments);
    }
    if (definition.stageOptions) {
      addStageOptions(sub);
    }

    sub.action(async () => {
      try {
        const options = parseCliOptions(sub.optsWithGlobals());
        const ctx = createCommandContext(options, deps);
        exitCode = await definition.handler(ctx, sub.args);
      } catch (error) {
        exitCode = reportError(error, deps);
      }
    });
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and --version exit through here with code 0
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    return reportError(error, deps);
  }

  return exitCode;
}

function reportError(error: unknown, deps: CliDeps): number {
  deps.io.stderr(`${chalk.red('✖')} ${errorMessage(error)}`);
  if (isPipelineError(error) && error.hint) {
    deps.io.stderr(`  ${chalk.gray('hint:')} ${error.hint}`);
  }
  return error instanceof ConfigError ? EXIT_USAGE : EXIT_FAILURE;
}
