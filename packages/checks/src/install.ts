/**
 * Dependency install check (`poetry install` by default)
 */

import type { CheckResult, ShellApi } from '@pubwatch/contracts';
import { BaseCheckAdapter } from './base.js';

export class InstallCheck extends BaseCheckAdapter {
  id = 'install' as const;

  constructor(
    shell: ShellApi,
    private readonly command: string[] = ['poetry', 'install']
  ) {
    super(shell);
  }

  async run(cwd: string, timeoutMs: number): Promise<CheckResult> {
    return this.runCommand(this.command, cwd, timeoutMs, 'Install failed');
  }
}
