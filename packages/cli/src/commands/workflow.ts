/**
 * Print the CI workflow template that drives `build` and `publish`
 */

import { readFile } from 'node:fs/promises';
import { errorMessage } from '@pubwatch/core';
import { EXIT_OK, defineCommand } from '../shared/define-command.js';

// Source layout (src/commands) and bundled layout (dist) sit at different depths
const TEMPLATE_CANDIDATES = ['../../templates/publish-workflow.yml', '../templates/publish-workflow.yml'];

export async function readWorkflowTemplate(): Promise<string> {
  const failures: string[] = [];
  for (const candidate of TEMPLATE_CANDIDATES) {
    try {
      return await readFile(new URL(candidate, import.meta.url), 'utf-8');
    } catch (error) {
      failures.push(errorMessage(error));
    }
  }
  throw new Error(`Workflow template not found: ${failures.join('; ')}`);
}

export const workflowCommand = defineCommand({
  name: 'workflow',
  description: 'Print a GitHub Actions workflow that runs build and publish',
  async handler(ctx) {
    ctx.io.stdout(await readWorkflowTemplate());
    return EXIT_OK;
  },
});
