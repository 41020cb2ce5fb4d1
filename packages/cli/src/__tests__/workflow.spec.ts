import { describe, it, expect } from 'vitest';
import { readWorkflowTemplate } from '../commands/workflow.js';

function runCommands(template: string): string[] {
  return template
    .split('\n')
    .map((line) => /^\s*(?:- )?run: (.+)$/.exec(line)?.[1])
    .filter((command): command is string => command !== undefined);
}

describe('workflow template', () => {
  it('runs pubwatch from the bundled checkout in both jobs', async () => {
    const template = await readWorkflowTemplate();

    expect(runCommands(template)).toEqual([
      'pipx install poetry',
      'npm install --prefix .pubwatch',
      'npm run bundle --prefix .pubwatch',
      'node .pubwatch/packages/cli/dist/bin.js info',
      'node .pubwatch/packages/cli/dist/bin.js build',
      'pipx install poetry',
      'npm install --prefix .pubwatch',
      'npm run bundle --prefix .pubwatch',
      'node .pubwatch/packages/cli/dist/bin.js publish',
    ]);
  });

  it('checks pubwatch out at a pinned ref', async () => {
    const lines = (await readWorkflowTemplate()).split('\n').map((line) => line.trim());

    expect(lines.filter((line) => line === 'ref: ${{ vars.PUBWATCH_REF }}')).toHaveLength(2);
    expect(lines.filter((line) => line === 'path: .pubwatch')).toHaveLength(2);
    expect(lines.some((line) => /\bnpx\b/.test(line))).toBe(false);
  });
});
