/**
 * Test suite check (`poetry run pytest` by default)
 */

import type { CheckResult, ShellApi } from '@pubwatch/contracts';
import { BaseCheckAdapter } from './base.js';

export class TestsCheck extends BaseCheckAdapter {
  id = 'tests' as const;

  constructor(
    shell: ShellApi,
    private readonly command: string[] = ['poetry', 'run', 'pytest'],
    private readonly enabled = true
  ) {
    super(shell);
  }

  async run(cwd: string, timeoutMs: number): Promise<CheckResult> {
    if (!this.enabled) {
      return this.createSkippedResult('tests disabled in configuration');
    }
    return this.runCommand(this.command, cwd, timeoutMs, 'Tests failed');
  }
}
