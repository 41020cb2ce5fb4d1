/**
 * Stage 2: resolve, publish and wait for the index to serve the version
 */

import { defineCommand } from '../shared/define-command.js';
import { runStages } from '../shared/stages.js';

export const publishCommand = defineCommand({
  name: 'publish',
  description: 'Publish the package and wait until the index serves the new version',
  stageOptions: true,
  handler: (ctx) => runStages(ctx, ['publish']),
});
