export * from './base.js';
export { InstallCheck } from './install.js';
export { TestsCheck } from './tests.js';

// Create check registry
import type { BuildSettings, CheckId, CheckResult, ShellApi } from '@pubwatch/contracts';
import type { CheckAdapter } from './base.js';
import { InstallCheck } from './install.js';
import { TestsCheck } from './tests.js';

export function createCheckRegistry(shell: ShellApi, settings?: BuildSettings): Map<CheckId, CheckAdapter> {
  const registry = new Map<CheckId, CheckAdapter>();

  registry.set('install', new InstallCheck(shell, settings?.installCommand));
  registry.set('tests', new TestsCheck(shell, settings?.testCommand, settings?.runTests ?? true));

  return registry;
}

/**
 * Run the requested checks sequentially; unknown ids are reported as failures
 */
export async function runChecks(options: {
  checkIds: CheckId[];
  cwd: string;
  registry: Map<CheckId, CheckAdapter>;
  timeoutMs?: number;
}): Promise<Partial<Record<CheckId, CheckResult>>> {
  const { checkIds, cwd, registry, timeoutMs = 600_000 } = options;

  const results: Partial<Record<CheckId, CheckResult>> = {};

  for (const checkId of checkIds) {
    const adapter = registry.get(checkId);
    if (!adapter) {
      results[checkId] = { id: checkId, ok: false, hint: `unknown check "${checkId}"`, timingMs: 0 };
      continue;
    }

    try {
      results[checkId] = await adapter.run(cwd, timeoutMs);
    } catch (error) {
      results[checkId] = {
        id: checkId,
        ok: false,
        hint: error instanceof Error ? error.message : String(error),
        timingMs: 0,
      };
    }
  }

  return results;
}
