import { describe, it, expect, vi } from 'vitest';
import type { BuildStageResult, PublishStageResult } from '@pubwatch/contracts';
import { runPipeline } from '../runner.js';
import { PublishError } from '../errors.js';

const passingBuild: BuildStageResult = {
  checks: {
    install: { id: 'install', ok: true },
    tests: { id: 'tests', ok: true, skipped: true, hint: 'tests disabled in configuration' },
  },
};

const failingBuild: BuildStageResult = {
  checks: { install: { id: 'install', ok: false, hint: 'Install failed: SolverProblemError' } },
};

const published: PublishStageResult = {
  resolved: { version: '1.2.0', indexVersion: '1.2.0', baseVersion: '1.2.0', channel: 'release', branch: 'main' },
  published: true,
  availability: {
    available: true,
    packageName: 'tap-demo',
    version: '1.2.0',
    attempts: 1,
    waitedMs: 0,
    lastOutcome: { status: 'found', message: 'ok' },
  },
};

describe('runPipeline', () => {
  it('runs build then publish', async () => {
    const order: string[] = [];
    const result = await runPipeline({
      runBuild: async () => {
        order.push('build');
        return passingBuild;
      },
      runPublish: async () => {
        order.push('publish');
        return published;
      },
      onStageChange: (stage) => order.push(`stage:${stage}`),
    });

    expect(result.ok).toBe(true);
    expect(result.errors).toBeUndefined();
    expect(order).toEqual(['stage:build', 'build', 'stage:publish', 'publish']);
  });

  it('never starts publish after a failed build', async () => {
    const runPublish = vi.fn(async () => published);

    const result = await runPipeline({ runBuild: async () => failingBuild, runPublish });

    expect(runPublish).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    expect(result.failedStage).toBe('build');
    expect(result.errors).toEqual([
      'Dependency install failed: Install failed: SolverProblemError',
      'hint: Run the install command locally to see the full output',
    ]);
  });

  it('fails the run when publishing throws', async () => {
    const result = await runPipeline({
      stages: ['publish'],
      runPublish: async () => {
        throw new PublishError('Failed to publish 1.2.0: HTTP Error 403', 'HTTP Error 403');
      },
    });

    expect(result.ok).toBe(false);
    expect(result.failedStage).toBe('publish');
    expect(result.errors?.[0]).toBe('Failed to publish 1.2.0: HTTP Error 403');
  });

  it('fails the run when the version never becomes available', async () => {
    const result = await runPipeline({
      stages: ['publish'],
      runPublish: async () => ({
        ...published,
        availability: {
          available: false,
          packageName: 'tap-demo',
          version: '1.2.0',
          attempts: 7,
          waitedMs: 180_000,
          lastOutcome: { status: 'not-found', message: 'still 404' },
        },
      }),
    });

    expect(result.ok).toBe(false);
    expect(result.publish?.availability?.attempts).toBe(7);
    expect(result.errors).toEqual([
      'Version 1.2.0 not found after 7 attempt(s). Last message from the index was: still 404',
    ]);
  });

  it('only runs the requested stages', async () => {
    const runBuild = vi.fn(async () => passingBuild);

    const result = await runPipeline({ stages: ['publish'], runBuild, runPublish: async () => published });

    expect(runBuild).not.toHaveBeenCalled();
    expect(result.build).toBeUndefined();
    expect(result.ok).toBe(true);
  });
});
