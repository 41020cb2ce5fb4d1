import { defineCommand } from '../shared/define-command.js';
import { runStages } from '../shared/stages.js';

export const runCommand = defineCommand({
  name: 'run',
  description: 'Run build, then publish if the build succeeded',
  stageOptions: true,
  handler: (ctx) => runStages(ctx, ['build', 'publish']),
});
