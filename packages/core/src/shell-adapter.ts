/**
 * @module @pubwatch/core/shell-adapter
 * ShellApi adapter over execa, used wherever a caller does not inject its own shell
 */

import { execa } from 'execa';
import type { ShellApi, ShellExecOptions, ShellResult } from '@pubwatch/contracts';

export function createExecaShellAdapter(): ShellApi {
  return {
    async exec(command: string, args: string[], options?: ShellExecOptions): Promise<ShellResult> {
      const startTime = Date.now();
      try {
        const result = await execa(command, args, {
          cwd: options?.cwd,
          timeout: options?.timeoutMs,
          env: options?.env,
          reject: false,
        });
        // exitCode is undefined when the process never started (ENOENT) or was killed
        const exitCode = typeof result.exitCode === 'number' ? result.exitCode : 1;
        return {
          ok: !result.failed && exitCode === 0,
          exitCode,
          stdout: result.stdout || '',
          stderr: result.stderr || (result.failed ? `Command failed: ${result.command}` : ''),
          timingMs: Date.now() - startTime,
        };
      } catch (error: unknown) {
        return {
          ok: false,
          exitCode: 1,
          stdout: '',
          stderr: error instanceof Error ? error.message : String(error),
          timingMs: Date.now() - startTime,
        };
      }
    },
  };
}

/**
 * Combined output of a command, stderr first since that is where pip and poetry report problems
 */
export function commandOutput(result: ShellResult): string {
  return [result.stderr, result.stdout]
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join('\n');
}
