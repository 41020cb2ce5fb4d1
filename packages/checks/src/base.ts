/**
 * Base adapter class for pipeline checks
 */

import type { CheckId, CheckResult, ShellApi, ShellResult } from '@pubwatch/contracts';

export interface CheckAdapter {
  id: CheckId;
  run(cwd: string, timeoutMs: number): Promise<CheckResult>;
}

export abstract class BaseCheckAdapter implements CheckAdapter {
  abstract id: CheckId;

  constructor(protected readonly shell: ShellApi) {}

  abstract run(cwd: string, timeoutMs: number): Promise<CheckResult>;

  /**
   * Run `command` and map its exit status onto a CheckResult
   */
  protected async runCommand(command: string[], cwd: string, timeoutMs: number, failHint: string): Promise<CheckResult> {
    const [cmd, ...args] = command;
    if (!cmd) {
      return this.createErrorResult('NO_COMMAND', 'no command configured', 0);
    }

    const start = Date.now();
    let result: ShellResult;
    try {
      result = await this.shell.exec(cmd, args, { cwd, timeoutMs });
    } catch (error: unknown) {
      return this.createErrorResult(
        'CHECK_ERROR',
        error instanceof Error ? error.message : String(error),
        Date.now() - start
      );
    }

    const timingMs = Date.now() - start;
    if (result.ok) {
      return this.createSuccessResult({ command: command.join(' '), exitCode: result.exitCode }, undefined, timingMs);
    }

    return this.createErrorResult('COMMAND_FAILED', `${failHint}: ${lastLine(result)}`, timingMs, {
      command: command.join(' '),
      exitCode: result.exitCode,
    });
  }

  protected createErrorResult(
    code: string,
    hint: string,
    timingMs: number,
    details?: Record<string, unknown>
  ): CheckResult {
    return {
      id: this.id,
      ok: false,
      hint,
      timingMs,
      details: {
        code,
        ...(details || {}),
      },
    };
  }

  protected createSuccessResult(
    details?: Record<string, unknown>,
    hint?: string,
    timingMs?: number
  ): CheckResult {
    return {
      id: this.id,
      ok: true,
      details,
      hint,
      timingMs,
    };
  }

  protected createSkippedResult(reason: string): CheckResult {
    return {
      id: this.id,
      ok: true,
      skipped: true,
      hint: reason,
    };
  }
}

function lastLine(result: ShellResult): string {
  const output = (result.stderr.trim() || result.stdout.trim()).split('\n');
  return output[output.length - 1]?.trim() || `exit code ${result.exitCode}`;
}
