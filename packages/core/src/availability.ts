/**
 * Availability poller: confirms a just-published version is served by the index.
 * Indexes are eventually consistent, so a successful upload is not proof of availability.
 */

import type { AvailabilityResult, PipelineLogger, ProbeOutcome } from '@pubwatch/contracts';
import { errorMessage } from './errors.js';
import { pollUntil, type Sleep } from './poll.js';
import { transientError, type RegistryProbe } from './registry/probe.js';

export const DEFAULT_MAX_ATTEMPTS = 7;
export const DEFAULT_INTERVAL_MS = 30_000;

export interface WaitForAvailabilityOptions {
  probe: RegistryProbe;
  packageName: string;
  version: string;
  maxAttempts?: number;
  intervalMs?: number;
  sleep?: Sleep;
  logger?: PipelineLogger;
}

export async function waitForAvailability(
  options: WaitForAvailabilityOptions
): Promise<AvailabilityResult> {
  const {
    probe,
    packageName,
    version,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    intervalMs = DEFAULT_INTERVAL_MS,
    sleep,
    logger,
  } = options;

  logger?.info('Checking index availability', { packageName, version, probe: probe.id, maxAttempts, intervalMs });

  const result = await pollUntil<ProbeOutcome>(
    async () => {
      try {
        return await probe.check(packageName, version);
      } catch (error) {
        return transientError(errorMessage(error));
      }
    },
    {
      maxAttempts,
      intervalMs,
      sleep,
      isDone: (outcome) => outcome.status === 'found',
      onAttempt: (attempt, outcome, willRetry) => {
        if (outcome.status === 'found') {
          logger?.info('Version is available', { version, attempt });
        } else if (willRetry) {
          logger?.info('Not yet found, waiting before next attempt', {
            version,
            attempt,
            status: outcome.status,
            retryInMs: intervalMs,
          });
        } else {
          logger?.error('Not found, giving up', { version, attempt, lastMessage: outcome.message });
        }
      },
    }
  );

  return {
    available: result.done,
    packageName,
    version,
    attempts: result.attempts,
    waitedMs: result.waitedMs,
    lastOutcome: result.last,
  };
}
