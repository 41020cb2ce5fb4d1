/**
 * Registry probe abstraction: answers "does the index serve this exact version yet?"
 */

import type { ProbeOutcome } from '@pubwatch/contracts';

export interface RegistryProbe {
  readonly id: string;
  check(packageName: string, version: string): Promise<ProbeOutcome>;
}

export function found(message: string): ProbeOutcome {
  return { status: 'found', message };
}

export function notFound(message: string): ProbeOutcome {
  return { status: 'not-found', message };
}

export function transientError(message: string): ProbeOutcome {
  return { status: 'transient-error', message };
}
