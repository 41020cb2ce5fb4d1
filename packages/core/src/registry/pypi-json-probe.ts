/**
 * Structured existence check against the index JSON API
 * (`GET /pypi/<name>/<version>/json`).
 */

import { z } from 'zod';
import type { ProbeOutcome } from '@pubwatch/contracts';
import { errorMessage } from '../errors.js';
import { toIndexVersion } from '../version-resolver.js';
import { found, notFound, transientError, type RegistryProbe } from './probe.js';

const ReleaseResponseSchema = z.object({
  info: z.object({
    name: z.string(),
    version: z.string(),
  }),
});

export interface PypiJsonProbeOptions {
  indexUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class PypiJsonProbe implements RegistryProbe {
  readonly id = 'json';
  private readonly indexUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PypiJsonProbeOptions = {}) {
    this.indexUrl = (options.indexUrl ?? 'https://pypi.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  releaseUrl(packageName: string, version: string): string {
    return `${this.indexUrl}/pypi/${encodeURIComponent(packageName)}/${encodeURIComponent(version)}/json`;
  }

  async check(packageName: string, version: string): Promise<ProbeOutcome> {
    const url = this.releaseUrl(packageName, version);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return transientError(`GET ${url} failed: ${errorMessage(error)}`);
    }

    if (response.status === 404) {
      return notFound(`${packageName} ${version} is not on the index yet (GET ${url} -> 404)`);
    }

    if (!response.ok) {
      return transientError(`GET ${url} -> ${response.status} ${response.statusText}`.trim());
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return transientError(`GET ${url} returned invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = ReleaseResponseSchema.safeParse(body);
    if (!parsed.success) {
      return transientError(`GET ${url} returned an unexpected payload`);
    }

    // the index reports the normalized form: 1.2.0rc1, not 1.2.0-rc.1
    if (toIndexVersion(parsed.data.info.version) !== toIndexVersion(version)) {
      return notFound(
        `Index answered for ${parsed.data.info.name} ${parsed.data.info.version}, expected ${version}`
      );
    }

    return found(`${parsed.data.info.name} ${parsed.data.info.version} is available`);
  }
}
