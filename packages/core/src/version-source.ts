/**
 * Base version sources: the VERSION file and the manifest version Poetry reports.
 * Both must agree before a version is published.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineLogger, ShellApi } from '@pubwatch/contracts';
import { PipelineError, VersionError, errorMessage } from './errors.js';
import { commandOutput } from './shell-adapter.js';

export async function readVersionFile(cwd: string, versionFile = 'VERSION'): Promise<string> {
  const path = join(cwd, versionFile);
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new VersionError('INVALID_VERSION', `Cannot read ${path}: ${errorMessage(error)}`);
  }

  const version = content.split(/\r?\n/)[0]?.trim() ?? '';
  if (!version) {
    throw new VersionError('INVALID_VERSION', `${path} is empty`);
  }
  return version;
}

export async function readManifestVersion(shell: ShellApi, cwd: string): Promise<string> {
  const result = await shell.exec('poetry', ['version', '--short'], { cwd, timeoutMs: 60_000 });
  const version = result.stdout.trim();
  if (!result.ok || !version) {
    throw new PipelineError('INVALID_VERSION', `poetry version --short failed: ${commandOutput(result)}`, {
      stage: 'publish',
      hint: 'Is Poetry installed and is there a pyproject.toml in the working directory?',
    });
  }
  return version;
}

export async function setManifestVersion(shell: ShellApi, cwd: string, version: string): Promise<void> {
  const result = await shell.exec('poetry', ['version', version], { cwd, timeoutMs: 60_000 });
  if (!result.ok) {
    throw new PipelineError('INVALID_VERSION', `poetry version ${version} failed: ${commandOutput(result)}`, {
      stage: 'publish',
    });
  }
}

export interface LoadBaseVersionOptions {
  cwd: string;
  shell: ShellApi;
  versionFile?: string;
  allowVersionDrift?: boolean;
  logger?: PipelineLogger;
}

/**
 * Read the base version from VERSION and cross-check it against the manifest
 */
export async function loadBaseVersion(options: LoadBaseVersionOptions): Promise<string> {
  const { cwd, shell, versionFile = 'VERSION', allowVersionDrift = false, logger } = options;

  const fileVersion = await readVersionFile(cwd, versionFile);
  const manifestVersion = await readManifestVersion(shell, cwd);

  if (fileVersion !== manifestVersion) {
    if (!allowVersionDrift) {
      throw new VersionError(
        'VERSION_MISMATCH',
        `${versionFile} says ${fileVersion} but the manifest says ${manifestVersion}`,
        'Update both to the same version, or pass --allow-version-drift to publish from VERSION'
      );
    }
    logger?.warn('VERSION and manifest disagree, using VERSION', { fileVersion, manifestVersion });
  }

  logger?.debug('Base version loaded', { version: fileVersion, source: versionFile });
  return fileVersion;
}
