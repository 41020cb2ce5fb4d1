/**
 * Stage 2: resolve the version, publish it, then confirm the index serves it
 */

import type {
  PipelineConfig,
  PipelineLogger,
  PipelineStep,
  PublishStageResult,
  ShellApi,
} from '@pubwatch/contracts';
import { waitForAvailability } from '../availability.js';
import { resolveBranch } from '../branch.js';
import { AvailabilityError, PipelineError } from '../errors.js';
import type { Sleep } from '../poll.js';
import { publishPackage } from '../publisher.js';
import { createRegistryProbe, type RegistryProbe } from '../registry/index.js';
import { createExecaShellAdapter } from '../shell-adapter.js';
import { loadBaseVersion } from '../version-source.js';
import { resolvePublishVersion } from '../version-resolver.js';

export interface PublishStageOptions {
  config: PipelineConfig;
  shell?: ShellApi;
  probe?: RegistryProbe;
  sleep?: Sleep;
  logger?: PipelineLogger;
  onStep?: (step: PipelineStep) => void;
}

export function requirePackageName(config: PipelineConfig): string {
  if (!config.packageName) {
    throw new PipelineError('MISSING_PACKAGE_NAME', 'packageName is not configured', {
      stage: 'publish',
      hint: `Add "packageName" to pubwatch.config.json or pass --package`,
    });
  }
  return config.packageName;
}

export async function runPublishStage(options: PublishStageOptions): Promise<PublishStageResult> {
  const { config, logger, onStep, sleep } = options;
  const shell = options.shell ?? createExecaShellAdapter();
  const packageName = requirePackageName(config);

  onStep?.('resolving');
  const branch = await resolveBranch(config.cwd, config.run.branch);
  const baseVersion = await loadBaseVersion({
    cwd: config.cwd,
    shell,
    versionFile: config.versionFile,
    allowVersionDrift: config.allowVersionDrift,
    logger,
  });
  const resolved = resolvePublishVersion({
    branch,
    baseVersion,
    runNumber: config.run.runNumber,
    releaseBranches: config.releaseBranches,
  });
  logger?.info('Resolved publish version', {
    branch: resolved.branch,
    channel: resolved.channel,
    version: resolved.version,
  });

  onStep?.('publishing');
  const publishing = await publishPackage({
    cwd: config.cwd,
    version: resolved.version,
    token: config.publishToken,
    repository: config.index.repository,
    dryRun: config.run.dryRun,
    timeoutMs: config.build.timeoutMs,
    shell,
    logger,
  });

  if (!publishing.published) {
    logger?.info('Nothing uploaded, skipping availability check');
    return { resolved, published: false };
  }

  onStep?.('waiting');
  const probe =
    options.probe ?? createRegistryProbe(config.probe, { indexUrl: config.index.url, cwd: config.cwd, shell });
  const availability = await waitForAvailability({
    probe,
    packageName,
    version: resolved.indexVersion,
    maxAttempts: config.poll.maxAttempts,
    intervalMs: config.poll.intervalMs,
    sleep,
    logger,
  });

  return { resolved, published: true, availability };
}

export function assertPublishConfirmed(result: PublishStageResult): void {
  const availability = result.availability;
  if (!result.published || !availability || availability.available) {
    return;
  }
  throw new AvailabilityError(availability.version, availability.attempts, availability.lastOutcome.message);
}
