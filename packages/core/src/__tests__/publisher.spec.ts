import { describe, it, expect } from 'vitest';
import { publishArgs, publishPackage, tokenEnvVar } from '../publisher.js';
import { PipelineError, PublishError } from '../errors.js';
import { createFakeShell } from './helpers.js';

const TOKEN = 'test-secret-token';

describe('publishPackage', () => {
  it('stamps the version, then builds and uploads with the token in the environment', async () => {
    const shell = createFakeShell();

    const result = await publishPackage({ cwd: '/work', version: '1.2.0-dev.42', token: TOKEN, shell });

    expect(result).toMatchObject({ version: '1.2.0-dev.42', published: true, dryRun: false });
    expect(shell.calls.map((call) => [call.command, ...call.args])).toEqual([
      ['poetry', 'version', '1.2.0-dev.42'],
      ['poetry', 'publish', '--build', '--no-interaction'],
    ]);
    expect(shell.calls[1]?.options?.env).toEqual({ POETRY_PYPI_TOKEN_PYPI: TOKEN });
  });

  it('never puts the token on the command line', async () => {
    const shell = createFakeShell();
    await publishPackage({ cwd: '/work', version: '1.0.0', token: TOKEN, shell });

    for (const call of shell.calls) {
      expect(call.args.join(' ')).not.toContain(TOKEN);
    }
  });

  it('fails without retry and masks the token in the error', async () => {
    const shell = createFakeShell((_command, args) =>
      args[0] === 'publish'
        ? { exitCode: 1, stderr: `HTTP Error 400: File already exists (token ${TOKEN})` }
        : {}
    );

    let caught: unknown;
    try {
      await publishPackage({ cwd: '/work', version: '1.0.0', token: TOKEN, shell });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PublishError);
    expect(caught).toMatchObject({
      code: 'PUBLISH_FAILED',
      output: 'HTTP Error 400: File already exists (token ***)',
    });
    expect(shell.calls.filter((call) => call.args[0] === 'publish')).toHaveLength(1);
  });

  it('refuses to upload without a token', async () => {
    const shell = createFakeShell();

    await expect(publishPackage({ cwd: '/work', version: '1.0.0', shell })).rejects.toThrow(PipelineError);
    expect(shell.calls).toHaveLength(0);
  });

  it('builds without uploading or stamping the manifest in dry-run mode', async () => {
    const shell = createFakeShell();

    const result = await publishPackage({ cwd: '/work', version: '1.0.0', dryRun: true, shell });

    expect(result.published).toBe(false);
    expect(shell.calls.map((call) => call.args)).toEqual([['publish', '--build', '--no-interaction', '--dry-run']]);
  });

  it('targets a named repository', async () => {
    const shell = createFakeShell();

    await publishPackage({ cwd: '/work', version: '1.0.0', token: TOKEN, repository: 'test-pypi', shell });

    expect(shell.calls[1]?.args).toEqual(['publish', '--build', '--no-interaction', '--repository', 'test-pypi']);
    expect(shell.calls[1]?.options?.env).toEqual({ POETRY_PYPI_TOKEN_TEST_PYPI: TOKEN });
  });
});

describe('publish helpers', () => {
  it('derives the poetry token variable', () => {
    expect(tokenEnvVar('pypi')).toBe('POETRY_PYPI_TOKEN_PYPI');
    expect(tokenEnvVar('test-pypi')).toBe('POETRY_PYPI_TOKEN_TEST_PYPI');
  });

  it('omits --repository for the default index', () => {
    expect(publishArgs('pypi', false)).toEqual(['publish', '--build', '--no-interaction']);
  });
});
