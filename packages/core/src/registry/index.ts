export * from './probe.js';
export { PypiJsonProbe, type PypiJsonProbeOptions } from './pypi-json-probe.js';
export { PipProbe, type PipProbeOptions } from './pip-probe.js';

import type { ProbeKind, ShellApi } from '@pubwatch/contracts';
import type { RegistryProbe } from './probe.js';
import { PypiJsonProbe } from './pypi-json-probe.js';
import { PipProbe } from './pip-probe.js';

export function createRegistryProbe(
  kind: ProbeKind,
  options: { indexUrl: string; cwd?: string; shell?: ShellApi; fetchImpl?: typeof fetch }
): RegistryProbe {
  if (kind === 'pip') {
    return new PipProbe({ indexUrl: options.indexUrl, cwd: options.cwd, shell: options.shell });
  }
  return new PypiJsonProbe({ indexUrl: options.indexUrl, fetchImpl: options.fetchImpl });
}
