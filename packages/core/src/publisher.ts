/**
 * Publisher - stamps the version into the manifest, builds and uploads the package.
 * An upload cannot be undone, so failures are never retried here.
 */

import type { PipelineLogger, ShellApi } from '@pubwatch/contracts';
import { PipelineError, PublishError } from './errors.js';
import { maskSecrets } from './redact.js';
import { commandOutput, createExecaShellAdapter } from './shell-adapter.js';
import { setManifestVersion } from './version-source.js';

export interface PublisherOptions {
  cwd: string;
  version: string;
  token?: string;
  repository?: string;
  dryRun?: boolean;
  timeoutMs?: number;
  shell?: ShellApi;
  logger?: PipelineLogger;
}

export interface PublishingResult {
  version: string;
  published: boolean;
  dryRun: boolean;
  timingMs: number;
}

/**
 * Poetry reads upload tokens from POETRY_PYPI_TOKEN_<REPOSITORY>
 */
export function tokenEnvVar(repository: string): string {
  return `POETRY_PYPI_TOKEN_${repository.toUpperCase().replace(/-/g, '_')}`;
}

export function publishArgs(repository: string, dryRun: boolean): string[] {
  const args = ['publish', '--build', '--no-interaction'];
  if (repository !== 'pypi') {
    args.push('--repository', repository);
  }
  if (dryRun) {
    args.push('--dry-run');
  }
  return args;
}

export async function publishPackage(options: PublisherOptions): Promise<PublishingResult> {
  const {
    cwd,
    version,
    token,
    repository = 'pypi',
    dryRun = false,
    timeoutMs = 600_000,
    logger,
  } = options;
  const shell = options.shell ?? createExecaShellAdapter();
  const startTime = Date.now();

  if (!dryRun && !token) {
    throw new PipelineError('MISSING_TOKEN', 'No publish token configured', {
      stage: 'publish',
      hint: 'Set PYPI_PUBLISH_TOKEN (or POETRY_PYPI_TOKEN_PYPI) in the job environment',
    });
  }

  // a dry run leaves pyproject.toml untouched and builds the manifest's own version
  if (dryRun) {
    logger?.info('Dry run: manifest version left unchanged', { version });
  } else {
    await setManifestVersion(shell, cwd, version);
  }
  logger?.info('Publishing version', { version, repository, dryRun });

  const env: Record<string, string> = {};
  if (token) {
    env[tokenEnvVar(repository)] = token;
  }

  const result = await shell.exec('poetry', publishArgs(repository, dryRun), { cwd, timeoutMs, env });
  const output = maskSecrets(commandOutput(result), [token]);

  if (!result.ok) {
    logger?.error('Publish failed', { version, exitCode: result.exitCode });
    throw new PublishError(`Failed to publish ${version}: ${output || `exit code ${result.exitCode}`}`, output);
  }

  logger?.info(dryRun ? 'Dry-run publish succeeded' : 'Published', { version, timingMs: result.timingMs });

  return {
    version,
    published: !dryRun,
    dryRun,
    timingMs: Date.now() - startTime,
  };
}
