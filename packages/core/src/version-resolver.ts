/**
 * Version resolver: computes the exact version string a run publishes.
 *
 * - release branches publish the base version unchanged
 * - every other branch publishes `<base>-dev.<runNumber>`
 */

import semver from 'semver';
import type { ResolvedVersion } from '@pubwatch/contracts';
import { VersionError } from './errors.js';

export const DEV_MARKER = '-dev.';

export interface ResolveVersionOptions {
  branch: string;
  baseVersion: string;
  runNumber?: number;
  releaseBranches?: string[];
}

/**
 * Strip the `refs/heads/` prefix GitHub puts on push refs
 */
export function normalizeBranch(ref: string): string {
  return ref.trim().replace(/^refs\/heads\//, '');
}

export function isReleaseBranch(ref: string, releaseBranches: string[] = ['main']): boolean {
  const branch = normalizeBranch(ref);
  return releaseBranches.some((candidate) => normalizeBranch(candidate) === branch);
}

export function resolvePublishVersion(options: ResolveVersionOptions): ResolvedVersion {
  const { branch, runNumber, releaseBranches = ['main'] } = options;
  const baseVersion = cleanBaseVersion(options.baseVersion);

  if (isReleaseBranch(branch, releaseBranches)) {
    return {
      version: baseVersion,
      indexVersion: toIndexVersion(baseVersion),
      baseVersion,
      channel: 'release',
      branch: normalizeBranch(branch),
    };
  }

  if (runNumber === undefined || !Number.isInteger(runNumber) || runNumber < 1) {
    throw new VersionError(
      'INVALID_RUN_NUMBER',
      `A positive run number is required to publish from branch "${normalizeBranch(branch)}"`,
      'Set GITHUB_RUN_NUMBER or pass --run-number'
    );
  }

  // 1.2.0 -> 1.2.0-dev.42, 1.2.0-rc.1 -> 1.2.0-rc.1.dev.42
  const separator = semver.prerelease(baseVersion) ? '.dev.' : DEV_MARKER;
  const version = `${baseVersion}${separator}${runNumber}`;
  const indexVersion = parseIndexVersion(version);
  if (indexVersion === undefined) {
    throw new VersionError(
      'INVALID_VERSION',
      `Cannot publish a dev build of "${baseVersion}": it already carries a dev segment`,
      'Publish dev builds from a release or rc base version'
    );
  }

  return {
    version,
    indexVersion,
    baseVersion,
    channel: 'dev',
    branch: normalizeBranch(branch),
  };
}

/**
 * Validate the base version and strip a leading `v` or `=`.
 * Only versions the Python index can store are accepted.
 */
function cleanBaseVersion(raw: string): string {
  const parsed = semver.parse(raw.trim());
  if (!parsed) {
    throw new VersionError(
      'INVALID_VERSION',
      `Base version "${raw.trim()}" is not a valid semantic version`,
      'The VERSION file must hold a single MAJOR.MINOR.PATCH version'
    );
  }
  if (parsed.build.length > 0) {
    throw new VersionError(
      'INVALID_VERSION',
      `Base version "${raw.trim()}" carries build metadata, which the package index rejects`,
      'Drop the "+..." part from VERSION'
    );
  }
  if (parseIndexVersion(parsed.version) === undefined) {
    throw new VersionError(
      'INVALID_VERSION',
      `Base version "${raw.trim()}" has a pre-release tag the package index cannot represent`,
      'Use an alpha, beta, rc or dev pre-release, e.g. 1.2.0-rc.1'
    );
  }
  return parsed.version;
}

export function isDevVersion(version: string): boolean {
  return parseIndexVersion(version)?.includes('.dev') ?? false;
}

const PRE_RELEASE_TAGS: Record<string, string> = {
  alpha: 'a',
  a: 'a',
  beta: 'b',
  b: 'b',
  rc: 'rc',
  c: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const INDEX_VERSION_PATTERN =
  /^v?(\d+(?:\.\d+)*)(?:[-_.]?(alpha|a|beta|b|rc|c|preview|pre)[-_.]?(\d*))?(?:[-_.]?dev[-_.]?(\d*))?$/i;

function parseIndexVersion(version: string): string | undefined {
  const match = INDEX_VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return undefined;
  }
  const [, release = '', preTag, preNumber, devNumber] = match;
  const pre = preTag ? `${PRE_RELEASE_TAGS[preTag.toLowerCase()] ?? preTag}${Number(preNumber || 0)}` : '';
  const dev = devNumber === undefined ? '' : `.dev${Number(devNumber || 0)}`;
  return `${release}${pre}${dev}`;
}

/**
 * Normalized (PEP 440) form the Python index stores a version under.
 * Accepts both the semver form pubwatch publishes and an already normalized one;
 * anything else comes back trimmed.
 *
 * Example:
 * - v1.2.0 -> 1.2.0
 * - 1.2.0-dev.42 -> 1.2.0.dev42
 * - 1.2.0-rc.1.dev.42 -> 1.2.0rc1.dev42
 * - 1.2.0-beta.2 -> 1.2.0b2
 */
export function toIndexVersion(version: string): string {
  return parseIndexVersion(version) ?? version.trim();
}
