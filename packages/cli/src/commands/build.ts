/**
 * Stage 1: install dependencies (and run tests when enabled)
 */

import { defineCommand } from '../shared/define-command.js';
import { runStages } from '../shared/stages.js';

export const buildCommand = defineCommand({
  name: 'build',
  description: 'Install project dependencies and run enabled checks',
  stageOptions: true,
  handler: (ctx) => runStages(ctx, ['build']),
});
