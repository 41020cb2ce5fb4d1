/**
 * Main pipeline runner - runs the build stage, then the publish stage only if build succeeded
 */

import type {
  BuildStageResult,
  PipelineLogger,
  PipelineResult,
  PipelineStage,
  PublishStageResult,
} from '@pubwatch/contracts';
import { errorMessage, isPipelineError } from './errors.js';
import { assertBuildPassed } from './stages/build-stage.js';
import { assertPublishConfirmed } from './stages/publish-stage.js';

export interface RunnerOptions {
  stages?: PipelineStage[];
  runBuild?: () => Promise<BuildStageResult>;
  runPublish?: () => Promise<PublishStageResult>;
  onStageChange?: (stage: PipelineStage) => void;
  logger?: PipelineLogger;
}

export async function runPipeline(options: RunnerOptions): Promise<PipelineResult> {
  const { stages = ['build', 'publish'], runBuild, runPublish, onStageChange, logger } = options;

  const startTime = Date.now();
  const result: PipelineResult = { ok: true, timingMs: 0 };
  let current: PipelineStage | undefined;

  try {
    if (stages.includes('build') && runBuild) {
      current = 'build';
      onStageChange?.('build');
      result.build = await runBuild();
      assertBuildPassed(result.build);
    }

    if (stages.includes('publish') && runPublish) {
      current = 'publish';
      onStageChange?.('publish');
      result.publish = await runPublish();
      assertPublishConfirmed(result.publish);
    }
  } catch (error) {
    const stage = (isPipelineError(error) ? error.stage : undefined) ?? current;
    logger?.error('Pipeline failed', { stage, error: errorMessage(error) });
    result.ok = false;
    result.failedStage = stage;
    result.errors = [errorMessage(error)];
    if (isPipelineError(error) && error.hint) {
      result.errors.push(`hint: ${error.hint}`);
    }
  }

  result.timingMs = Date.now() - startTime;
  return result;
}
