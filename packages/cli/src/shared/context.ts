/**
 * Per-invocation command context: parsed options, logger, IO and injectable collaborators
 */

import { resolve } from 'node:path';
import type { PipelineConfig, ShellApi } from '@pubwatch/contracts';
import { createExecaShellAdapter, loadPipelineConfig, readRunEnv, type Sleep } from '@pubwatch/core';
import { Logger, type LogLevel } from './logger.js';
import { toConfigOverrides, type CliOptions } from './options.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * Collaborators the CLI would otherwise take from the process; tests replace them
 */
export interface CliDeps {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  shell: ShellApi;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
  cwd: string;
  /** Whether the log stream is a terminal; colors are off otherwise */
  isTTY: boolean;
}

export interface CommandContext {
  cwd: string;
  options: CliOptions;
  logger: Logger;
  io: CliIO;
  shell: ShellApi;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
  loadConfig(): Promise<PipelineConfig>;
}

export function defaultDeps(): CliDeps {
  return {
    io: {
      stdout: (text) => process.stdout.write(text.endsWith('\n') ? text : text + '\n'),
      stderr: (text) => process.stderr.write(text.endsWith('\n') ? text : text + '\n'),
    },
    env: process.env,
    shell: createExecaShellAdapter(),
    cwd: process.cwd(),
    isTTY: Boolean(process.stderr.isTTY),
  };
}

export function createCommandContext(options: CliOptions, deps: CliDeps): CommandContext {
  const cwd = options.cwd ? resolve(deps.cwd, options.cwd) : deps.cwd;
  const logger = new Logger({
    level: resolveLogLevel(options, deps.env),
    colors: options.color && deps.isTTY && !deps.env['NO_COLOR'],
    json: options.json,
    write: deps.io.stderr,
  });

  return {
    cwd,
    options,
    logger,
    io: deps.io,
    shell: deps.shell,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
    async loadConfig() {
      const config = await loadPipelineConfig({
        cwd,
        configPath: options.config,
        env: deps.env,
        overrides: toConfigOverrides(options),
      });
      logger.addSecret(config.publishToken);
      return config;
    },
  };
}

function resolveLogLevel(options: CliOptions, env: NodeJS.ProcessEnv): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  if (options.quiet) {
    return 'warn';
  }
  return readRunEnv(env).PUBWATCH_LOG_LEVEL ?? 'info';
}
