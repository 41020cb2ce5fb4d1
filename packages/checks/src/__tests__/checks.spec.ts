import { describe, it, expect } from 'vitest';
import type { ShellApi, ShellExecOptions, ShellResult } from '@pubwatch/contracts';
import { InstallCheck, TestsCheck, createCheckRegistry, runChecks } from '../index.js';

function fakeShell(reply: Partial<ShellResult> = {}): ShellApi & { calls: Array<{ command: string; args: string[]; options?: ShellExecOptions }> } {
  const calls: Array<{ command: string; args: string[]; options?: ShellExecOptions }> = [];
  return {
    calls,
    async exec(command, args, options) {
      calls.push({ command, args, options });
      const exitCode = reply.exitCode ?? 0;
      return {
        ok: exitCode === 0,
        exitCode,
        stdout: reply.stdout ?? '',
        stderr: reply.stderr ?? '',
        timingMs: 1,
      };
    },
  };
}

describe('InstallCheck', () => {
  it('runs poetry install in the project directory', async () => {
    const shell = fakeShell();

    const result = await new InstallCheck(shell).run('/work', 1000);

    expect(result).toMatchObject({
      id: 'install',
      ok: true,
      details: { command: 'poetry install', exitCode: 0 },
    });
    expect(shell.calls).toEqual([{ command: 'poetry', args: ['install'], options: { cwd: '/work', timeoutMs: 1000 } }]);
  });

  it('reports the last line of output on failure', async () => {
    const shell = fakeShell({ exitCode: 1, stderr: 'Resolving dependencies...\nSolverProblemError: no match\n' });

    const result = await new InstallCheck(shell).run('/work', 1000);

    expect(result).toMatchObject({
      id: 'install',
      ok: false,
      hint: 'Install failed: SolverProblemError: no match',
      details: { code: 'COMMAND_FAILED', command: 'poetry install', exitCode: 1 },
    });
  });

  it('uses a configured command', async () => {
    const shell = fakeShell();

    await new InstallCheck(shell, ['poetry', 'install', '--no-root']).run('/work', 1000);

    expect(shell.calls[0]?.args).toEqual(['install', '--no-root']);
  });
});

describe('TestsCheck', () => {
  it('is skipped when disabled', async () => {
    const shell = fakeShell();

    const result = await new TestsCheck(shell, undefined, false).run('/work', 1000);

    expect(result).toEqual({ id: 'tests', ok: true, skipped: true, hint: 'tests disabled in configuration' });
    expect(shell.calls).toHaveLength(0);
  });

  it('runs pytest through poetry when enabled', async () => {
    const shell = fakeShell({ exitCode: 1, stdout: '== 2 failed, 10 passed ==' });

    const result = await new TestsCheck(shell).run('/work', 1000);

    expect(shell.calls[0]).toMatchObject({ command: 'poetry', args: ['run', 'pytest'] });
    expect(result.hint).toBe('Tests failed: == 2 failed, 10 passed ==');
  });
});

describe('runChecks', () => {
  it('runs the requested checks in order', async () => {
    const shell = fakeShell();
    const registry = createCheckRegistry(shell, {
      installCommand: ['poetry', 'install'],
      testCommand: ['poetry', 'run', 'pytest'],
      runTests: true,
      timeoutMs: 5000,
    });

    const results = await runChecks({ checkIds: ['install', 'tests'], cwd: '/work', registry, timeoutMs: 5000 });

    expect(Object.keys(results)).toEqual(['install', 'tests']);
    expect(shell.calls.map((call) => call.args.join(' '))).toEqual(['install', 'run pytest']);
  });

  it('reports unknown checks as failures', async () => {
    const results = await runChecks({ checkIds: ['lint'], cwd: '/work', registry: createCheckRegistry(fakeShell()) });

    expect(results.lint).toEqual({ id: 'lint', ok: false, hint: 'unknown check "lint"', timingMs: 0 });
  });

  it('turns a throwing adapter into a failed result', async () => {
    const shell: ShellApi = {
      async exec() {
        throw new Error('spawn poetry ENOENT');
      },
    };
    const results = await runChecks({ checkIds: ['install'], cwd: '/work', registry: createCheckRegistry(shell) });

    expect(results.install).toMatchObject({ ok: false, hint: 'spawn poetry ENOENT', details: { code: 'CHECK_ERROR' } });
  });
});
