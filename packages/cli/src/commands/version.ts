/**
 * Print the version this run would publish
 */

import { loadBaseVersion, resolveBranch, resolvePublishVersion } from '@pubwatch/core';
import { EXIT_OK, defineCommand } from '../shared/define-command.js';

export const versionCommand = defineCommand({
  name: 'version',
  description: 'Resolve the version to publish for the current branch and run',
  stageOptions: true,
  async handler(ctx) {
    const config = await ctx.loadConfig();

    const branch = await resolveBranch(config.cwd, config.run.branch);
    const baseVersion = await loadBaseVersion({
      cwd: config.cwd,
      shell: ctx.shell,
      versionFile: config.versionFile,
      allowVersionDrift: config.allowVersionDrift,
      logger: ctx.logger,
    });
    const resolved = resolvePublishVersion({
      branch,
      baseVersion,
      runNumber: config.run.runNumber,
      releaseBranches: config.releaseBranches,
    });

    ctx.logger.debug('Resolved version', { channel: resolved.channel, branch: resolved.branch });
    ctx.io.stdout(ctx.options.json ? JSON.stringify(resolved, null, 2) : resolved.version);
    return EXIT_OK;
  },
});
