/**
 * Print build identification (build number, VERSION.build, run id)
 */

import { collectVersionInfo, formatVersionInfo } from '@pubwatch/core';
import { EXIT_OK, defineCommand } from '../shared/define-command.js';

export const infoCommand = defineCommand({
  name: 'info',
  description: 'Print build number, build version and run id',
  stageOptions: true,
  async handler(ctx) {
    const config = await ctx.loadConfig();
    const info = await collectVersionInfo(config);

    ctx.io.stdout(ctx.options.json ? JSON.stringify(info, null, 2) : formatVersionInfo(info));
    return EXIT_OK;
  },
});
