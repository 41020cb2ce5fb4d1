/**
 * Wires the core stage functions to the CLI's collaborators and prints the report
 */

import type { PipelineConfig, PipelineStage } from '@pubwatch/contracts';
import { createCheckRegistry, runChecks } from '@pubwatch/checks';
import {
  createRegistryProbe,
  createReport,
  renderJson,
  renderText,
  runBuildStage,
  runPipeline,
  runPublishStage,
} from '@pubwatch/core';
import type { CommandContext } from './context.js';
import { EXIT_FAILURE, EXIT_OK } from './define-command.js';

export async function runStages(ctx: CommandContext, stages: PipelineStage[]): Promise<number> {
  const config = await ctx.loadConfig();
  const { logger } = ctx;

  const result = await runPipeline({
    stages,
    logger,
    onStageChange: (stage) => logger.info(`Stage: ${stage}`),
    runBuild: () => buildStage(ctx, config),
    runPublish: () =>
      runPublishStage({
        config,
        shell: ctx.shell,
        probe: createRegistryProbe(config.probe, {
          indexUrl: config.index.url,
          cwd: config.cwd,
          shell: ctx.shell,
          fetchImpl: ctx.fetchImpl,
        }),
        sleep: ctx.sleep,
        logger,
        onStep: (step) => logger.debug(`Step: ${step}`),
      }),
  });

  const report = createReport(
    {
      cwd: config.cwd,
      branch: result.publish?.resolved.branch ?? config.run.branch ?? '',
      runNumber: config.run.runNumber,
      runId: config.run.runId,
      dryRun: config.run.dryRun,
    },
    stages,
    result
  );

  ctx.io.stdout(ctx.options.json ? renderJson(report) : renderText(report));
  return result.ok ? EXIT_OK : EXIT_FAILURE;
}

function buildStage(ctx: CommandContext, config: PipelineConfig) {
  const registry = createCheckRegistry(ctx.shell, config.build);
  return runBuildStage({
    config,
    logger: ctx.logger,
    onStep: (step) => ctx.logger.debug(`Step: ${step}`),
    runChecks: (checkIds) =>
      runChecks({ checkIds, cwd: config.cwd, registry, timeoutMs: config.build.timeoutMs }),
  });
}
