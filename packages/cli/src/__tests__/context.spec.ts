import { describe, it, expect } from 'vitest';
import type { ShellApi } from '@pubwatch/contracts';
import { createCommandContext, type CliDeps } from '../shared/context.js';
import { parseCliOptions } from '../shared/options.js';

const shell: ShellApi = {
  async exec() {
    return { ok: true, exitCode: 0, stdout: '', stderr: '', timingMs: 0 };
  },
};

function depsFor(overrides: Partial<CliDeps>): CliDeps {
  return {
    io: { stdout: () => undefined, stderr: () => undefined },
    env: {},
    shell,
    cwd: '/work',
    isTTY: true,
    ...overrides,
  };
}

describe('createCommandContext', () => {
  it('colors log output on a terminal', () => {
    const ctx = createCommandContext(parseCliOptions({}), depsFor({}));

    expect(ctx.logger.colors).toBe(true);
  });

  it('turns colors off when the log stream is not a terminal', () => {
    const ctx = createCommandContext(parseCliOptions({}), depsFor({ isTTY: false }));

    expect(ctx.logger.colors).toBe(false);
  });

  it('turns colors off for NO_COLOR and --no-color', () => {
    expect(createCommandContext(parseCliOptions({}), depsFor({ env: { NO_COLOR: '1' } })).logger.colors).toBe(false);
    expect(createCommandContext(parseCliOptions({ color: false }), depsFor({})).logger.colors).toBe(false);
  });

  it('resolves --cwd against the process directory', () => {
    const ctx = createCommandContext(parseCliOptions({ cwd: 'pkg' }), depsFor({}));

    expect(ctx.cwd).toBe('/work/pkg');
  });
});
