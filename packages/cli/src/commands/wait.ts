/**
 * Poll the index for a version that was published elsewhere
 */

import {
  AvailabilityError,
  createRegistryProbe,
  formatTiming,
  requirePackageName,
  toIndexVersion,
  waitForAvailability,
} from '@pubwatch/core';
import { EXIT_FAILURE, EXIT_OK, defineCommand } from '../shared/define-command.js';

export const waitCommand = defineCommand({
  name: 'wait',
  description: 'Wait until the index serves <version>',
  arguments: '<version>',
  stageOptions: true,
  async handler(ctx, args) {
    const config = await ctx.loadConfig();
    const packageName = requirePackageName(config);
    const version = toIndexVersion(args[0] ?? '');

    const result = await waitForAvailability({
      probe: createRegistryProbe(config.probe, {
        indexUrl: config.index.url,
        cwd: config.cwd,
        shell: ctx.shell,
        fetchImpl: ctx.fetchImpl,
      }),
      packageName,
      version,
      maxAttempts: config.poll.maxAttempts,
      intervalMs: config.poll.intervalMs,
      sleep: ctx.sleep,
      logger: ctx.logger,
    });

    if (ctx.options.json) {
      ctx.io.stdout(JSON.stringify(result, null, 2));
    } else if (result.available) {
      ctx.io.stdout(`${packageName} ${version} is available (${result.attempts} attempt(s), waited ${formatTiming(result.waitedMs)})`);
    } else {
      ctx.io.stdout(new AvailabilityError(version, result.attempts, result.lastOutcome.message).message);
    }

    return result.available ? EXIT_OK : EXIT_FAILURE;
  },
});
