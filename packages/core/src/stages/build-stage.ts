/**
 * Stage 1: install project dependencies and, when enabled, run the test suite
 */

import type {
  BuildStageResult,
  CheckId,
  CheckResult,
  PipelineConfig,
  PipelineLogger,
  PipelineStep,
} from '@pubwatch/contracts';
import { InstallError } from '../errors.js';

export type RunChecksFn = (checkIds: CheckId[]) => Promise<Partial<Record<CheckId, CheckResult>>>;

export interface BuildStageOptions {
  config: PipelineConfig;
  runChecks: RunChecksFn;
  logger?: PipelineLogger;
  onStep?: (step: PipelineStep) => void;
}

export async function runBuildStage(options: BuildStageOptions): Promise<BuildStageResult> {
  const { config, runChecks, logger, onStep } = options;
  const checks: Partial<Record<CheckId, CheckResult>> = {};

  onStep?.('installing');
  logger?.info('Installing project dependencies', { command: config.build.installCommand.join(' ') });
  Object.assign(checks, await runChecks(['install']));

  if (!checks.install?.ok) {
    return { checks };
  }

  if (config.build.runTests) {
    onStep?.('testing');
    logger?.info('Running tests', { command: config.build.testCommand.join(' ') });
    Object.assign(checks, await runChecks(['tests']));
  } else {
    logger?.debug('Tests are disabled for this project');
    checks.tests = { id: 'tests', ok: true, skipped: true, hint: 'tests disabled in configuration' };
  }

  return { checks };
}

/**
 * Turn the first failed check into the stage's fatal error
 */
export function assertBuildPassed(result: BuildStageResult): void {
  for (const [id, check] of Object.entries(result.checks)) {
    if (!check || check.ok) {
      continue;
    }
    const detail = check.hint ?? 'check failed';
    if (id === 'tests') {
      throw new InstallError('TESTS_FAILED', `Tests failed: ${detail}`);
    }
    throw new InstallError('INSTALL_FAILED', `Dependency install failed: ${detail}`, 'Run the install command locally to see the full output');
  }

  if (!result.checks.install) {
    throw new InstallError('INSTALL_FAILED', 'Dependency install did not run');
  }
}
