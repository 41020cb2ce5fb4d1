export { cli, commands, CLI_VERSION } from './cli.js';
export { Logger, type LoggerOptions, type LogLevel } from './shared/logger.js';
export type { CliDeps, CliIO, CommandContext } from './shared/context.js';
export { defineCommand, type CliCommand } from './shared/define-command.js';
